import { Session } from '../../db/types';
import { FormattedSessionListItem } from './types';

export function formatSessionListItem(session: Session): FormattedSessionListItem {
  return {
    id: session.id,
    created_at: session.created_at,
    expires_at: session.expires_at,
    ip_address: session.ip_address,
    is_active: session.is_active === 1,
  };
}
