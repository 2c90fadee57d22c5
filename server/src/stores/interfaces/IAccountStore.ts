import { Account } from '../../db/types';
import { AccountCreateInput, AccountUpdateInput, ListOptions } from '../types';

/**
 * Store interface for Account entity operations
 */
export interface IAccountStore {
  // Find operations
  findById(id: string): Account | undefined;
  findByEmail(email: string): Account | undefined;
  findByUsername(username: string): Account | undefined;
  findAll(options?: ListOptions): Account[];

  // Write operations
  create(input: AccountCreateInput): Account;
  update(id: string, input: AccountUpdateInput): Account | undefined;

  // Utility
  exists(id: string): boolean;
  count(): number;
  countAdmins(): number;
}
