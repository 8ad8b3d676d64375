import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.THROTTLE_LIMIT = process.env.THROTTLE_LIMIT ?? '1000';
process.env.POLICY_MAX_FILE_SIZE_MB =
  process.env.POLICY_MAX_FILE_SIZE_MB ?? '1';
