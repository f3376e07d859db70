import { ExecutionEngine } from './engineClient';
import { errorMessage } from './errors';
import { exponentialBackoff, Sleep, withRetry } from './retry';
import type { EngineRuntime } from './types';

export interface RuntimeLoadOptions {
  attempts: number;
  baseDelayMs?: number;
  sleep?: Sleep;
  logPrefix?: string;
}

/**
 * Language name or alias (case-insensitive) to the engine's version string.
 * Built once from the engine's runtime list and never changed afterwards.
 */
export class RuntimeRegistry {
  private readonly versions: ReadonlyMap<string, string>;
  private readonly languages: readonly string[];

  constructor(runtimes: EngineRuntime[]) {
    const versions = new Map<string, string>();
    const languages: string[] = [];

    for (const runtime of runtimes) {
      const language = runtime.language.toLowerCase();
      if (!languages.includes(language)) {
        languages.push(language);
      }
      // A later entry for the same name or alias wins, as in the engine's own listing order.
      for (const name of [runtime.language, ...runtime.aliases]) {
        versions.set(name.toLowerCase(), runtime.version);
      }
    }

    this.versions = versions;
    this.languages = languages;
  }

  /**
   * Fetches the runtime list with exponential backoff. Throws the last error
   * once `attempts` fetches have failed.
   */
  static async load(engine: ExecutionEngine, options: RuntimeLoadOptions): Promise<RuntimeRegistry> {
    const prefix = options.logPrefix ?? 'Feeder:';
    const runtimes = await withRetry(() => engine.runtimes(), {
      attempts: options.attempts,
      delayMs: exponentialBackoff(options.baseDelayMs ?? 1000),
      sleep: options.sleep,
      onRetry: (error, attempt, delay) => {
        console.error(
          `${prefix} Attempt ${attempt}/${options.attempts} to fetch runtimes failed: ${errorMessage(error)}. Retrying in ${delay}ms`
        );
      },
    });

    const registry = new RuntimeRegistry(runtimes);
    for (const runtime of runtimes) {
      const aliases = runtime.aliases.length > 0 ? ` (${runtime.aliases.join(', ')})` : '';
      console.log(`${prefix} Loaded runtime: ${runtime.language} ${runtime.version}${aliases}`);
    }
    console.log(`${prefix} Loaded ${registry.getSupportedLanguages().length} languages`);
    return registry;
  }

  resolve(language: string): string | undefined {
    return this.versions.get(language.toLowerCase());
  }

  isSupported(language: string): boolean {
    return this.versions.has(language.toLowerCase());
  }

  getSupportedLanguages(): string[] {
    return [...this.languages];
  }
}
