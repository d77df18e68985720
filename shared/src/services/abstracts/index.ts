/**
 * Abstract Service Classes
 *
 * Base classes of the client's long-lived services. The concrete classes
 * depend on these, so tests can hand in fakes.
 */

export { AService } from './AService.js';
export { ALogger, type LogContext } from '../../utils/logging/ALogger.js';
export { AGameRegistry } from '../../registry/AGameRegistry.js';
export { AMnemyApiClient } from '../../api/AMnemyApiClient.js';
