/**
 * Blob Transport Types
 *
 * The transport stores, and deletes, binary payloads on the remote
 * messaging backend. The custody engine never sees payload bytes.
 */

import type { FileKind, TransportLocation } from './file.js';

/**
 * What the engine asks the transport to persist
 */
export interface StoreBlobRequest {
  kind: FileKind;
  rawHandle: string;
  caption: string;
}

/**
 * Stable references returned by the transport after a successful store
 */
export interface StoredBlob {
  blobRef: string;
  blobUniqueRef: string;
  transportLocation: TransportLocation;
}

/**
 * Transport contract. Implementations honour the abort signal; the engine
 * aborts it when the configured timeout elapses.
 */
export interface BlobTransport {
  store(request: StoreBlobRequest, signal: AbortSignal): Promise<StoredBlob>;
  delete(location: TransportLocation, signal: AbortSignal): Promise<boolean>;
}
