/**
 * Persistence-layer errors
 *
 * Only the shapes the router must be able to wrap and rethrow; the stores
 * themselves live outside this repository.
 */

export type DatabaseErrorCode =
  | 'database_connection_error'
  | 'not_found'
  | 'unique_violation'
  | 'others';

const DATABASE_MESSAGES: Record<DatabaseErrorCode, string> = {
  database_connection_error: 'An error occurred when obtaining database connection',
  not_found: 'The requested resource was not found in the database',
  unique_violation: 'A unique constraint violation occurred',
  others: 'An unknown error occurred',
};

export class DatabaseError extends Error {
  readonly layer = 'database';
  readonly code: DatabaseErrorCode;

  constructor(code: DatabaseErrorCode, options?: ErrorOptions) {
    super(DATABASE_MESSAGES[code], options);
    this.name = 'DatabaseError';
    this.code = code;
  }
}

export type RedisErrorCode =
  | 'set_failed'
  | 'set_ex_failed'
  | 'set_expiry_failed'
  | 'get_failed'
  | 'delete_failed'
  | 'stream_append_failed'
  | 'stream_read_failed'
  | 'stream_delete_failed'
  | 'stream_acknowledge_failed'
  | 'consumer_group_create_failed'
  | 'consumer_group_destroy_failed'
  | 'consumer_group_remove_consumer_failed'
  | 'consumer_group_set_id_failed'
  | 'consumer_group_claim_failed'
  | 'json_serialization_failed'
  | 'json_deserialization_failed';

const REDIS_MESSAGES: Record<RedisErrorCode, string> = {
  set_failed: 'Failed to set key value in Redis',
  set_ex_failed: 'Failed to set key value with expiry in Redis',
  set_expiry_failed: 'Failed to set expiry for key value in Redis',
  get_failed: 'Failed to get key value in Redis',
  delete_failed: 'Failed to delete key value in Redis',
  stream_append_failed: 'Failed to append entry to redis stream',
  stream_read_failed: 'Failed to read entries from redis stream',
  stream_delete_failed: 'Failed to delete entries from redis stream',
  stream_acknowledge_failed: 'Failed to acknowledge redis stream entry',
  consumer_group_create_failed: 'Failed to create redis consumer group',
  consumer_group_destroy_failed: 'Failed to destroy redis consumer group',
  consumer_group_remove_consumer_failed: 'Failed to delete consumer from consumer group',
  consumer_group_set_id_failed: 'Failed to set last ID on consumer group',
  consumer_group_claim_failed: 'Failed to set redis stream message owner',
  json_serialization_failed: 'Failed to serialize application type to json',
  json_deserialization_failed: 'Failed to deserialize application type from json',
};

export class RedisError extends Error {
  readonly layer = 'redis';
  readonly code: RedisErrorCode;

  constructor(code: RedisErrorCode, options?: ErrorOptions) {
    super(REDIS_MESSAGES[code], options);
    this.name = 'RedisError';
    this.code = code;
  }
}

export type StorageErrorCode = 'database_error' | 'value_not_found' | 'duplicate_value' | 'kv_error';

export class StorageError extends Error {
  readonly layer = 'storage';
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
  }
}

/** Create a value-not-found storage error */
export function valueNotFound(what: string): StorageError {
  return new StorageError('value_not_found', `ValueNotFound: ${what}`);
}
