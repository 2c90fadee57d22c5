// Data source formatters
export {
  formatDataSource,
  formatDataSourceListItem,
  formatDataSourceList,
} from './dataSourceFormatter';

// Team formatters
export { formatTeamDetail, formatTeamListItem } from './teamFormatter';

// Account formatters
export { formatAccount, toAccountSummary } from './accountFormatter';

// Session formatters
export { formatSessionListItem } from './sessionFormatter';

// Types
export * from './types';
