import type { DiscoveredCommand } from '../catalog/types.js';
import type { ExecutionContext } from '../context.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CommandProvider } from './types.js';

/**
 * Aggregates providers in registration order. The first pass is cached until
 * refresh(); a provider that throws is skipped and never aborts the pass.
 */
export class DiscoveryEngine {
  private readonly providers: CommandProvider[] = [];
  private cache: readonly DiscoveredCommand[] | null = null;

  constructor(providers: readonly CommandProvider[] = []) {
    for (const provider of providers) this.register(provider);
  }

  register(provider: CommandProvider): void {
    if (this.providers.some(p => p.name === provider.name)) {
      logger.warn({ provider: provider.name }, 'Duplicate provider registration; both will run');
    }
    this.providers.push(provider);
  }

  providerNames(): string[] {
    return this.providers.map(p => p.name);
  }

  discover(context: ExecutionContext): readonly DiscoveredCommand[] {
    if (this.cache) return this.cache;

    const commands: DiscoveredCommand[] = [];
    const seen = new Set<string>();
    for (const provider of this.providers) {
      for (const command of this.runProvider(provider, context)) {
        if (seen.has(command.id)) {
          logger.warn({ provider: provider.name, id: command.id }, 'Duplicate command id, keeping the first');
          continue;
        }
        seen.add(command.id);
        commands.push(command);
      }
    }

    this.cache = Object.freeze(commands);
    return this.cache;
  }

  refresh(): void {
    this.cache = null;
  }

  private runProvider(provider: CommandProvider, context: ExecutionContext): DiscoveredCommand[] {
    try {
      if (!provider.isAvailable(context)) return [];
      const found = provider.discover(context);
      logger.debug({ provider: provider.name, count: found.length }, 'Provider discovered commands');
      return found;
    } catch (err) {
      logger.debug({ provider: provider.name, error: errorMessage(err) }, 'Provider failed, skipping');
      return [];
    }
  }
}
