/**
 * Base abstract class for long-lived client services.
 *
 * Services expose an initialization order and lifecycle hooks. `createMnemyServices`
 * initializes them lowest order first and disposes them in reverse.
 *
 * @example
 * ```typescript
 * export abstract class ALogger extends AService {
 *   readonly order = -100;  // Initialize first
 *
 *   abstract info(message: string): void;
 * }
 * ```
 */
export abstract class AService {
  /**
   * Initialization order. Lower numbers initialize first.
   * - -100: ALogger
   * - 0: default (settings, credentials, registry)
   * - 50: services that depend on several others (sync, watcher)
   */
  readonly order: number = 0;

  /**
   * Called once after construction, before the service is used.
   */
  async initialize(): Promise<void> {
    // Default: no-op, override in subclasses that need async init
  }

  /**
   * Called on shutdown. Override to close handles or stop loops.
   */
  async dispose(): Promise<void> {
    // Default: no-op, override in subclasses that need cleanup
  }
}
