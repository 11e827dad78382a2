import { Server } from 'http';
import { MemoryGateway } from '../../src/persistence/memory.gateway';
import { Container, createContainer } from '../../src/container';
import { Subject, User, UserRole } from '../../src/types/user.types';
import { createApp } from '../../src/app';

export const TEST_PASSWORD = 'test-password';

export interface TestContext {
  gateway: MemoryGateway;
  container: Container;
  quartermaster: Subject;
  admin: Subject;
  member: Subject;
}

export const toSubject = (user: User): Subject => ({
  id: user.id,
  role: user.role,
  isActive: user.isActive,
  fullName: user.fullName,
});

/**
 * Fresh in-memory store with one account per role, all sharing TEST_PASSWORD.
 * Users: 1 quartermaster "qm", 2 admin "admin", 3 member "member".
 */
export async function createTestContext(): Promise<TestContext> {
  const gateway = new MemoryGateway();
  const container = createContainer(gateway, {
    jwtSecret: 'test-secret',
    jwtExpiresInSeconds: 3600,
    bcryptRounds: 4,
  });

  const seeded = await container.userService.ensureDefaultQuartermaster('qm', TEST_PASSWORD);
  if (!seeded) {
    throw new Error('Expected an empty store to seed a quartermaster');
  }
  const quartermaster = toSubject(seeded);

  const admin = await container.userService.createUser(quartermaster, {
    username: 'admin',
    password: TEST_PASSWORD,
    fullName: 'Alice Admin',
    role: UserRole.ADMIN,
  });
  const member = await container.userService.createUser(quartermaster, {
    username: 'member',
    password: TEST_PASSWORD,
    fullName: 'Mark Member',
    role: UserRole.MEMBER,
  });

  return { gateway, container, quartermaster, admin: toSubject(admin), member: toSubject(member) };
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Start the Express app on an ephemeral port
 */
export async function startServer(container: Container): Promise<RunningServer> {
  const app = createApp(container);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
