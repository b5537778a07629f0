export const ROLES = ['user', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Account domain entity.
 * `passwordHash` is an encoded hash, never the plain password.
 */
export interface Account {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
}

/**
 * Values persisted for a new account (id is assigned by storage).
 */
export type NewAccountRecord = Omit<Account, 'id'>;

/**
 * Fields that may change after creation. Username and id are immutable.
 */
export type AccountChanges = Partial<Pick<Account, 'email' | 'role' | 'passwordHash'>>;

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}
