/**
 * User and identity domain types
 */

export enum UserRole {
  MEMBER = 'member',
  ADMIN = 'admin',
  QUARTERMASTER = 'quartermaster',
}

export interface User {
  id: number;
  username: string;
  fullName: string;
  role: UserRole;
  isActive: boolean;
  createdAt: Date;
  lastLogin: Date | null;
}

/**
 * The acting party of an operation, as resolved by the identity provider.
 */
export interface Subject {
  id: number;
  role: UserRole;
  isActive: boolean;
  fullName: string;
}

// Database row type (snake_case from PostgreSQL)
export interface UserFields {
  username: string;
  password_hash: string;
  full_name: string;
  role: string;
  is_active: boolean;
  created_date: string;
  last_login: string | null;
}

export interface CreateUserInput {
  username: string;
  password: string;
  fullName: string;
  role: UserRole;
}

export interface UpdateUserInput {
  username?: string;
  fullName?: string;
  role?: UserRole;
  isActive?: boolean;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  user: User;
}
