/**
 * Blob store seen by the splitter. Paths are "/"-separated object keys.
 * Implementations must accept concurrent calls from several workers.
 */
export interface IBlobStorage {
  /** All object keys starting with `prefix`, in key order. */
  list(prefix: string): Promise<string[]>;
  read(path: string): Promise<Uint8Array>;
  /** Creates or overwrites the object. */
  write(path: string, data: Uint8Array | string): Promise<void>;
  copy(sourcePath: string, destinationPath: string): Promise<void>;
  delete(path: string): Promise<void>;
}
