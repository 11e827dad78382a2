import { JwtPayload, sign, verify } from 'jsonwebtoken';
import { z } from 'zod';
import { UserRepository } from '../repositories/user.repository';
import { Subject, User } from '../types/user.types';
import { Errors } from '../types/error.types';
import { moduleLogger } from '../config/logger';

const logger = moduleLogger('identity');

export interface IssuedToken {
  token: string;
  expiresIn: number;
}

/**
 * Resolves an opaque bearer credential to the acting subject.
 */
export interface IdentityProvider {
  issue(user: User): IssuedToken;
  resolve(token: string): Promise<Subject>;
}

const tokenPayloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
});

/**
 * HS256 JWT identity provider. The token only carries the user id; role and
 * active flag are read from storage on every resolve so a role change or a
 * deactivation applies to tokens already issued.
 */
export class JwtIdentityProvider implements IdentityProvider {
  constructor(
    private userRepo: UserRepository,
    private secret: string,
    private expiresInSeconds: number
  ) {}

  issue(user: User): IssuedToken {
    const token = sign({ role: user.role }, this.secret, {
      algorithm: 'HS256',
      subject: String(user.id),
      expiresIn: this.expiresInSeconds,
    });

    return { token, expiresIn: this.expiresInSeconds };
  }

  async resolve(token: string): Promise<Subject> {
    let decoded: string | JwtPayload;
    try {
      decoded = verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (error) {
      logger.debug('Token verification failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw Errors.unauthenticated('Invalid or expired token');
    }

    const payload = tokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw Errors.unauthenticated('Could not validate credentials');
    }

    const user = await this.userRepo.findById(Number(payload.data.sub));
    if (!user) {
      throw Errors.unauthenticated('User not found');
    }

    return {
      id: user.id,
      role: user.role,
      isActive: user.isActive,
      fullName: user.fullName,
    };
  }
}
