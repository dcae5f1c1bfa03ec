export * from './credential-pool.service';
