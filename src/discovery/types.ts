import type { DiscoveredCommand } from '../catalog/types.js';
import type { ExecutionContext } from '../context.js';

/**
 * One ecosystem's command detector. Providers hold no state: both methods
 * read only the filesystem and the context, and never spawn processes.
 */
export interface CommandProvider {
  readonly name: string;
  /** Cheap existence check: files present, executable on PATH. */
  isAvailable(context: ExecutionContext): boolean;
  /** Commands sorted by name; may throw on malformed input. */
  discover(context: ExecutionContext): DiscoveredCommand[];
}
