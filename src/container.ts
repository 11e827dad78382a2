import { PersistenceGateway } from './persistence/gateway';
import { ItemRepository } from './repositories/item.repository';
import { UserRepository } from './repositories/user.repository';
import { RequestRepository } from './repositories/request.repository';
import { CatalogRepository } from './repositories/catalog.repository';
import { ItemService } from './services/item.service';
import { RequestService } from './services/request.service';
import { UserService } from './services/user.service';
import { AuthService } from './services/auth.service';
import { CatalogService } from './services/catalog.service';
import { PasswordService } from './services/password.service';
import { IdentityProvider, JwtIdentityProvider } from './services/identity.service';
import { CatalogKind } from './types/catalog.types';

export interface ContainerOptions {
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  bcryptRounds: number;
}

export interface Container {
  gateway: PersistenceGateway;
  identity: IdentityProvider;
  itemService: ItemService;
  requestService: RequestService;
  userService: UserService;
  authService: AuthService;
  categoryService: CatalogService;
  locationService: CatalogService;
}

/**
 * Composition root: wires repositories and services over one gateway.
 * Tests build their own container over a MemoryGateway.
 */
export const createContainer = (gateway: PersistenceGateway, options: ContainerOptions): Container => {
  const itemRepository = new ItemRepository(gateway);
  const userRepository = new UserRepository(gateway);
  const requestRepository = new RequestRepository(gateway);

  const passwords = new PasswordService(options.bcryptRounds);
  const identity = new JwtIdentityProvider(userRepository, options.jwtSecret, options.jwtExpiresInSeconds);

  const itemService = new ItemService(itemRepository);
  const userService = new UserService(userRepository, passwords);

  return {
    gateway,
    identity,
    itemService,
    requestService: new RequestService(requestRepository, userRepository, itemRepository, itemService),
    userService,
    authService: new AuthService(userRepository, passwords, identity),
    categoryService: new CatalogService(
      CatalogKind.CATEGORY,
      new CatalogRepository(gateway, 'categories'),
      userRepository
    ),
    locationService: new CatalogService(
      CatalogKind.LOCATION,
      new CatalogRepository(gateway, 'locations'),
      userRepository
    ),
  };
};
