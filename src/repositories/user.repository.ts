import { PersistenceGateway, Stored, TableGateway } from '../persistence/gateway';
import { User, UserFields, UserRole } from '../types/user.types';
import { moduleLogger } from '../config/logger';
import { parseStoredEnum } from '../utils/enum-parser';

const logger = moduleLogger('user-repository');

export interface UserCredentials {
  user: User;
  passwordHash: string;
}

export interface NewUserRecord {
  username: string;
  passwordHash: string;
  fullName: string;
  role: UserRole;
}

/**
 * User Repository
 *
 * Handles all storage operations for the users table
 */
export class UserRepository {
  private users: TableGateway<UserFields>;

  constructor(gateway: PersistenceGateway) {
    this.users = gateway.table('users');
  }

  async create(record: NewUserRecord): Promise<User> {
    logger.debug('Creating user', { username: record.username, role: record.role });

    const row = await this.users.insert({
      username: record.username,
      password_hash: record.passwordHash,
      full_name: record.fullName,
      role: record.role,
      is_active: true,
      created_date: new Date().toISOString(),
      last_login: null,
    });

    return this.mapToUser(row);
  }

  async findById(id: number): Promise<User | null> {
    const row = await this.users.get(id);
    return row ? this.mapToUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const credentials = await this.findCredentials(username);
    return credentials ? credentials.user : null;
  }

  /**
   * User plus stored password hash, for credential checks only
   */
  async findCredentials(username: string): Promise<UserCredentials | null> {
    const [row] = await this.users.scan({ username }, { limit: 1 });
    return row ? { user: this.mapToUser(row), passwordHash: row.password_hash } : null;
  }

  async findPasswordHash(id: number): Promise<string | null> {
    const row = await this.users.get(id);
    return row ? row.password_hash : null;
  }

  /**
   * All users, newest first
   */
  async findAll(): Promise<User[]> {
    const rows = await this.users.scan(
      {},
      {
        orderBy: [
          { column: 'created_date', ascending: false },
          { column: 'id', ascending: false },
        ],
      }
    );
    return rows.map((row) => this.mapToUser(row));
  }

  async hasAnyUser(): Promise<boolean> {
    const rows = await this.users.scan({}, { limit: 1 });
    return rows.length > 0;
  }

  async update(
    id: number,
    changes: Partial<Pick<UserFields, 'username' | 'full_name' | 'role' | 'is_active'>>
  ): Promise<User | null> {
    const row = await this.users.updateIf(id, {}, changes);
    return row ? this.mapToUser(row) : null;
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<boolean> {
    const row = await this.users.updateIf(id, {}, { password_hash: passwordHash });
    return row !== null;
  }

  async touchLastLogin(id: number): Promise<User | null> {
    const row = await this.users.updateIf(id, {}, { last_login: new Date().toISOString() });
    return row ? this.mapToUser(row) : null;
  }

  /**
   * Map database row to domain model
   */
  private mapToUser(row: Stored<UserFields>): User {
    return {
      id: row.id,
      username: row.username,
      fullName: row.full_name,
      role: parseStoredEnum(UserRole, row.role, 'users.role'),
      isActive: row.is_active,
      createdAt: new Date(row.created_date),
      lastLogin: row.last_login ? new Date(row.last_login) : null,
    };
  }
}
