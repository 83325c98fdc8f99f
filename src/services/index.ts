/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database and the blob transport.
 * All business logic lives here.
 */

// CustodyService
export type { CustodyService, CustodyServiceDb } from './custody.service.js';
export { createCustodyService, MAX_ID_ATTEMPTS } from './custody.service.js';
export { createCustodyServiceDb, mapRowToFile } from './file.db.js';

// UserService
export type { UserService, UserServiceDb } from './user.service.js';
export { createUserService } from './user.service.js';
export { createUserServiceDb } from './user.db.js';

// Blob transport
export type { TelegramClient } from './telegram.client.js';
export { createTelegramClient } from './telegram.client.js';
export { createTelegramTransport } from './telegram.transport.js';

// Errors
export { DuplicateKeyError, StoreError } from './store.errors.js';
export { TransportError } from './transport.errors.js';
