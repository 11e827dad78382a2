import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { Environment } from './environment';
import { PersistenceGateway } from '../persistence/gateway';
import { SupabaseGateway } from '../persistence/supabase.gateway';
import { MemoryGateway } from '../persistence/memory.gateway';

/**
 * Create a Supabase client
 *
 * Configuration:
 * - Uses service role key for admin access (bypasses RLS)
 * - Disables auth sessions (the API issues its own bearer tokens)
 * - Connection pooling managed by Supabase
 */
export const createSupabaseClient = (url: string, serviceRoleKey: string): SupabaseClient => {
  const client = createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
  });

  logger.info('Supabase client initialized', { url, schema: 'public' });
  return client;
};

/**
 * Build the persistence gateway for the configured data store.
 *
 * Called once by the composition root; the result is passed to every
 * repository rather than held in module state.
 */
export const createPersistenceGateway = (config: Environment): PersistenceGateway => {
  switch (config.DATA_STORE) {
    case 'memory':
      logger.warn('Using in-memory data store; data is lost on restart');
      return new MemoryGateway();
    case 'supabase': {
      if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
        throw new Error('Supabase configuration is missing');
      }
      const client = createSupabaseClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY);
      return new SupabaseGateway(client, config.STORAGE_TIMEOUT_MS);
    }
  }
};

/**
 * Test database connection
 *
 * @returns true if connection successful
 */
export const testConnection = async (gateway: PersistenceGateway): Promise<boolean> => {
  try {
    await gateway.ping();
    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error });
    return false;
  }
};
