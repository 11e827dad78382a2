import { UserRepository } from '../repositories/user.repository';
import { PasswordService } from './password.service';
import { IdentityProvider } from './identity.service';
import { LoginResult, Subject, User } from '../types/user.types';
import { AppError, ErrorCode, Errors } from '../types/error.types';
import { moduleLogger } from '../config/logger';

const logger = moduleLogger('auth-service');

/**
 * Auth Service
 *
 * Credential login and the current-user lookup
 */
export class AuthService {
  constructor(
    private userRepo: UserRepository,
    private passwords: PasswordService,
    private identity: IdentityProvider
  ) {}

  /**
   * Verify credentials, stamp the last login and issue a bearer token
   */
  async login(username: string, password: string): Promise<LoginResult> {
    const credentials = await this.userRepo.findCredentials(username);

    if (!credentials || !(await this.passwords.verify(password, credentials.passwordHash))) {
      logger.info('Login failed', { username });
      throw Errors.invalidCredentials();
    }

    if (!credentials.user.isActive) {
      logger.info('Login refused for inactive account', { userId: credentials.user.id });
      throw new AppError(ErrorCode.ACCOUNT_INACTIVE, 'User account is inactive', 403);
    }

    const user = (await this.userRepo.touchLastLogin(credentials.user.id)) ?? credentials.user;
    const { token, expiresIn } = this.identity.issue(user);

    logger.info('User logged in', { userId: user.id, role: user.role });
    return { accessToken: token, tokenType: 'bearer', expiresIn, user };
  }

  async currentUser(subject: Subject): Promise<User> {
    const user = await this.userRepo.findById(subject.id);

    if (!user) {
      throw Errors.notFound('User', subject.id);
    }

    return user;
  }
}
