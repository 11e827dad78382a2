import { UserRepository } from '../repositories/user.repository';
import { PasswordService } from './password.service';
import { CreateUserInput, Subject, UpdateUserInput, User, UserRole } from '../types/user.types';
import { Operation } from '../types/authorization.types';
import { AppError, ErrorCode, Errors, isAppError } from '../types/error.types';
import { assertAuthorized } from './authorization.service';
import { moduleLogger } from '../config/logger';

const logger = moduleLogger('user-service');

/**
 * User Service
 *
 * Account management for quartermasters, plus self-service password change
 */
export class UserService {
  constructor(
    private userRepo: UserRepository,
    private passwords: PasswordService
  ) {}

  async listUsers(subject: Subject): Promise<User[]> {
    assertAuthorized(subject, Operation.MANAGE_USERS);
    return this.userRepo.findAll();
  }

  async getUser(subject: Subject, id: number): Promise<User> {
    assertAuthorized(subject, Operation.MANAGE_USERS);
    return this.requireUser(id);
  }

  async createUser(subject: Subject, input: CreateUserInput): Promise<User> {
    assertAuthorized(subject, Operation.MANAGE_USERS);
    logger.info('Creating user', { username: input.username, role: input.role, by: subject.id });

    if (await this.userRepo.findByUsername(input.username)) {
      throw Errors.duplicateLogin(input.username);
    }

    const passwordHash = await this.passwords.hash(input.password);

    try {
      const user = await this.userRepo.create({
        username: input.username,
        passwordHash,
        fullName: input.fullName,
        role: input.role,
      });

      logger.info('User created', { userId: user.id });
      return user;
    } catch (error) {
      if (isAppError(error, ErrorCode.CONSTRAINT_VIOLATION)) {
        throw Errors.duplicateLogin(input.username);
      }
      throw error;
    }
  }

  /**
   * Partial update. A username change is checked against every other account.
   */
  async updateUser(subject: Subject, id: number, input: UpdateUserInput): Promise<User> {
    assertAuthorized(subject, Operation.MANAGE_USERS);
    logger.info('Updating user', { id, fields: Object.keys(input), by: subject.id });

    const existing = await this.requireUser(id);

    if (input.isActive === false && id === subject.id) {
      throw Errors.cannotDeactivateSelf();
    }

    if (input.username !== undefined && input.username !== existing.username) {
      const holder = await this.userRepo.findByUsername(input.username);
      if (holder && holder.id !== id) {
        throw Errors.duplicateLogin(input.username);
      }
    }

    try {
      const updated = await this.userRepo.update(id, {
        ...(input.username !== undefined && { username: input.username }),
        ...(input.fullName !== undefined && { full_name: input.fullName }),
        ...(input.role !== undefined && { role: input.role }),
        ...(input.isActive !== undefined && { is_active: input.isActive }),
      });

      if (!updated) throw Errors.notFound('User', id);
      return updated;
    } catch (error) {
      if (isAppError(error, ErrorCode.CONSTRAINT_VIOLATION) && input.username !== undefined) {
        throw Errors.duplicateLogin(input.username);
      }
      throw error;
    }
  }

  /**
   * Soft delete: the account stays for history and request joins
   */
  async deactivateUser(subject: Subject, id: number): Promise<User> {
    assertAuthorized(subject, Operation.MANAGE_USERS);

    if (id === subject.id) {
      throw Errors.cannotDeactivateSelf();
    }

    const updated = await this.userRepo.update(id, { is_active: false });
    if (!updated) {
      throw Errors.notFound('User', id);
    }

    logger.info('User deactivated', { id, by: subject.id });
    return updated;
  }

  /**
   * Quartermaster-assisted reset; the old password is not asked for.
   */
  async resetPassword(subject: Subject, id: number, newPassword: string): Promise<void> {
    assertAuthorized(subject, Operation.MANAGE_USERS);

    const passwordHash = await this.passwords.hash(newPassword);
    const updated = await this.userRepo.updatePasswordHash(id, passwordHash);
    if (!updated) {
      throw Errors.notFound('User', id);
    }

    logger.info('Password reset', { id, by: subject.id });
  }

  /**
   * Self-service change; requires the current password.
   */
  async changePassword(subject: Subject, currentPassword: string, newPassword: string): Promise<void> {
    if (!subject.isActive) {
      throw new AppError(ErrorCode.ACCOUNT_INACTIVE, 'User account is inactive', 403);
    }

    const storedHash = await this.userRepo.findPasswordHash(subject.id);
    if (!storedHash) {
      throw Errors.notFound('User', subject.id);
    }

    if (!(await this.passwords.verify(currentPassword, storedHash))) {
      throw new AppError(ErrorCode.INVALID_CREDENTIALS, 'Current password is incorrect', 401);
    }

    await this.userRepo.updatePasswordHash(subject.id, await this.passwords.hash(newPassword));
    logger.info('Password changed', { id: subject.id });
  }

  /**
   * Create the first quartermaster when the users table is empty. Returns the
   * account created, or null when none was needed or no password is configured.
   */
  async ensureDefaultQuartermaster(username: string, password: string | undefined): Promise<User | null> {
    if (await this.userRepo.hasAnyUser()) {
      return null;
    }

    if (!password) {
      logger.warn('No users exist and DEFAULT_QUARTERMASTER_PASSWORD is not set; skipping bootstrap');
      return null;
    }

    const user = await this.userRepo.create({
      username,
      passwordHash: await this.passwords.hash(password),
      fullName: 'Default Quartermaster',
      role: UserRole.QUARTERMASTER,
    });

    logger.warn('Default quartermaster account created; change its password after first login', {
      username,
    });
    return user;
  }

  private async requireUser(id: number): Promise<User> {
    const user = await this.userRepo.findById(id);

    if (!user) {
      throw Errors.notFound('User', id);
    }

    return user;
  }
}
