/**
 * Logger interface for filesystem tracing.
 * Implement this to capture mounts, copy-ups and structural changes.
 */
export interface VfsLogger {
  /** Log informational messages (mount, unmount, root lifecycle) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (copy-up, bulk removal, rename) */
  debug(message: string, data?: Record<string, unknown>): void;
}
