import { describe, it, expect, beforeEach } from 'vitest';
import { sign } from 'jsonwebtoken';
import { createTestContext, TEST_PASSWORD, TestContext, toSubject } from './helpers/fixtures';
import { UserService } from '../src/services/user.service';
import { AuthService } from '../src/services/auth.service';
import { ErrorCode } from '../src/types/error.types';
import { UserRole } from '../src/types/user.types';

describe('UserService', () => {
  let ctx: TestContext;
  let users: UserService;

  beforeEach(async () => {
    ctx = await createTestContext();
    users = ctx.container.userService;
  });

  it('seeds the default quartermaster only into an empty store', async () => {
    expect(await users.ensureDefaultQuartermaster('another', TEST_PASSWORD)).toBeNull();

    const quartermaster = await users.getUser(ctx.quartermaster, ctx.quartermaster.id);
    expect(quartermaster).toMatchObject({
      username: 'qm',
      fullName: 'Default Quartermaster',
      role: UserRole.QUARTERMASTER,
      isActive: true,
    });
  });

  it('lists accounts newest first', async () => {
    const listed = await users.listUsers(ctx.quartermaster);

    expect(listed.map((user) => user.username)).toEqual(['member', 'admin', 'qm']);
  });

  it('refuses a username already taken', async () => {
    await expect(
      users.createUser(ctx.quartermaster, {
        username: 'admin',
        password: TEST_PASSWORD,
        fullName: 'Second Admin',
        role: UserRole.ADMIN,
      })
    ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_LOGIN, statusCode: 409 });
  });

  it('keeps user management from admins', async () => {
    await expect(users.listUsers(ctx.admin)).rejects.toMatchObject({ code: ErrorCode.PERMISSION_DENIED });
  });

  it('updates only the provided fields', async () => {
    const updated = await users.updateUser(ctx.quartermaster, ctx.member.id, { role: UserRole.ADMIN });

    expect(updated).toMatchObject({ username: 'member', fullName: 'Mark Member', role: UserRole.ADMIN });
  });

  it('checks a new username against every other account', async () => {
    await expect(
      users.updateUser(ctx.quartermaster, ctx.member.id, { username: 'admin' })
    ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_LOGIN });

    const kept = await users.updateUser(ctx.quartermaster, ctx.member.id, { username: 'member' });
    expect(kept.username).toBe('member');
  });

  it('refuses to deactivate the acting account', async () => {
    await expect(users.deactivateUser(ctx.quartermaster, ctx.quartermaster.id)).rejects.toMatchObject({
      code: ErrorCode.CANNOT_DEACTIVATE_SELF,
      statusCode: 403,
    });
    await expect(
      users.updateUser(ctx.quartermaster, ctx.quartermaster.id, { isActive: false })
    ).rejects.toMatchObject({ code: ErrorCode.CANNOT_DEACTIVATE_SELF });
  });

  it('deactivates another account', async () => {
    const deactivated = await users.deactivateUser(ctx.quartermaster, ctx.member.id);

    expect(deactivated.isActive).toBe(false);
  });

  it('reports an unknown account as NOT_FOUND', async () => {
    await expect(users.deactivateUser(ctx.quartermaster, 40)).rejects.toMatchObject({
      code: ErrorCode.NOT_FOUND,
    });
    await expect(users.resetPassword(ctx.quartermaster, 40, 'new-test-password')).rejects.toMatchObject({
      code: ErrorCode.NOT_FOUND,
    });
  });
});

describe('AuthService', () => {
  let ctx: TestContext;
  let auth: AuthService;

  beforeEach(async () => {
    ctx = await createTestContext();
    auth = ctx.container.authService;
  });

  it('issues a bearer token that resolves to the account', async () => {
    const result = await auth.login('admin', TEST_PASSWORD);

    expect(result.tokenType).toBe('bearer');
    expect(result.expiresIn).toBe(3600);
    expect(result.user.username).toBe('admin');
    expect(result.user.lastLogin).toBeInstanceOf(Date);

    expect(await ctx.container.identity.resolve(result.accessToken)).toEqual({
      id: ctx.admin.id,
      role: UserRole.ADMIN,
      isActive: true,
      fullName: 'Alice Admin',
    });
  });

  it('gives the same answer for an unknown user and a wrong password', async () => {
    await expect(auth.login('admin', 'wrong-password')).rejects.toMatchObject({
      code: ErrorCode.INVALID_CREDENTIALS,
      statusCode: 401,
      message: 'Incorrect username or password',
    });
    await expect(auth.login('nobody', TEST_PASSWORD)).rejects.toMatchObject({
      code: ErrorCode.INVALID_CREDENTIALS,
      message: 'Incorrect username or password',
    });
  });

  it('refuses an inactive account and reflects deactivation in issued tokens', async () => {
    const { accessToken } = await auth.login('member', TEST_PASSWORD);
    await ctx.container.userService.deactivateUser(ctx.quartermaster, ctx.member.id);

    await expect(auth.login('member', TEST_PASSWORD)).rejects.toMatchObject({
      code: ErrorCode.ACCOUNT_INACTIVE,
      statusCode: 403,
    });
    expect((await ctx.container.identity.resolve(accessToken)).isActive).toBe(false);
  });

  it('rejects tokens signed with another secret', async () => {
    const forged = sign({ role: UserRole.QUARTERMASTER }, 'other-test-secret', {
      algorithm: 'HS256',
      subject: String(ctx.quartermaster.id),
    });

    await expect(ctx.container.identity.resolve(forged)).rejects.toMatchObject({
      code: ErrorCode.UNAUTHENTICATED,
      statusCode: 401,
    });
  });

  it('rejects a token for an account that no longer exists', async () => {
    const orphan = sign({ role: UserRole.ADMIN }, 'test-secret', { algorithm: 'HS256', subject: '999' });

    await expect(ctx.container.identity.resolve(orphan)).rejects.toMatchObject({
      code: ErrorCode.UNAUTHENTICATED,
      message: 'User not found',
    });
  });

  it('changes a password only with the current one', async () => {
    const users = ctx.container.userService;

    await expect(users.changePassword(ctx.member, 'wrong-password', 'new-test-password')).rejects.toMatchObject({
      code: ErrorCode.INVALID_CREDENTIALS,
      message: 'Current password is incorrect',
    });

    await users.changePassword(ctx.member, TEST_PASSWORD, 'new-test-password');

    await expect(auth.login('member', TEST_PASSWORD)).rejects.toMatchObject({
      code: ErrorCode.INVALID_CREDENTIALS,
    });
    expect((await auth.login('member', 'new-test-password')).user.id).toBe(ctx.member.id);
  });

  it('lets a quartermaster reset a password without the old one', async () => {
    await ctx.container.userService.resetPassword(ctx.quartermaster, ctx.admin.id, 'reset-test-password');

    const result = await auth.login('admin', 'reset-test-password');
    expect(toSubject(result.user)).toEqual(ctx.admin);
  });
});
