import type { LoggerLike } from '../logging/logger-like.js';
import { createMutex } from '../mutex.js';
import type { Extension, ExtensionCatalog, ExtensionCommand, ExtensionContext } from './types.js';

export type RegistryErrorKind =
  | 'AlreadyLoaded'
  | 'NotLoaded'
  | 'NotFound'
  | 'LoadFailed'
  | 'CommandConflict';

export type RegistryResult =
  | { ok: true; name: string; commands: string[] }
  | { ok: false; name: string; kind: RegistryErrorKind; error: string };

export type RegistryOptions = {
  catalog: ExtensionCatalog;
  /** Shared context; `loadedExtensions` is filled in by the registry. */
  context: Omit<ExtensionContext, 'loadedExtensions'>;
  log?: LoggerLike;
};

type LoadedExtension = {
  extension: Extension;
  commandNames: string[];
};

function fail(name: string, kind: RegistryErrorKind, error: string): RegistryResult {
  return { ok: false, name, kind, error };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns which extensions are loaded and which slash commands they expose.
 *
 * Load/unload/reload are serialized; each one registers or deregisters the
 * extension's commands so `commands()` always reflects loaded extensions only.
 */
export class ExtensionRegistry {
  private readonly catalog: ExtensionCatalog;
  private readonly context: ExtensionContext;
  private readonly log?: LoggerLike;
  private readonly loadedByName = new Map<string, LoadedExtension>();
  private readonly commandOwners = new Map<string, { extension: string; command: ExtensionCommand }>();
  private readonly mutex = createMutex();

  constructor(opts: RegistryOptions) {
    this.catalog = opts.catalog;
    this.log = opts.log;
    this.context = { ...opts.context, loadedExtensions: () => this.loaded() };
  }

  /** Extension names the catalog can load, in discovery order. */
  available(): string[] {
    return [...this.catalog.keys()];
  }

  loaded(): string[] {
    return [...this.loadedByName.keys()];
  }

  isLoaded(name: string): boolean {
    return this.loadedByName.has(name);
  }

  commands(): ExtensionCommand[] {
    return [...this.commandOwners.values()].map((entry) => entry.command);
  }

  resolveCommand(commandName: string): ExtensionCommand | undefined {
    return this.commandOwners.get(commandName)?.command;
  }

  /** Name of the extension that registered `commandName`. */
  ownerOf(commandName: string): string | undefined {
    return this.commandOwners.get(commandName)?.extension;
  }

  load(name: string): Promise<RegistryResult> {
    return this.mutex.runExclusive(() => this.loadUnlocked(name));
  }

  unload(name: string): Promise<RegistryResult> {
    return this.mutex.runExclusive(() => this.unloadUnlocked(name));
  }

  /**
   * Best-effort reload: unload when loaded, then load a fresh instance.
   * An extension that was not loaded is simply loaded.
   */
  reload(name: string): Promise<RegistryResult> {
    return this.mutex.runExclusive(async () => {
      const unloaded = await this.unloadUnlocked(name);
      if (!unloaded.ok && unloaded.kind !== 'NotLoaded') return unloaded;
      if (!unloaded.ok) {
        this.log?.info({ extension: name }, 'extensions:reload target was not loaded; loading');
      }
      return this.loadUnlocked(name);
    });
  }

  /**
   * Load every name in order. A failure is recorded in its slot and never
   * stops the remaining loads.
   */
  async loadAll(names: readonly string[]): Promise<RegistryResult[]> {
    const results: RegistryResult[] = [];
    for (const name of names) {
      results.push(await this.load(name));
    }
    return results;
  }

  private async loadUnlocked(name: string): Promise<RegistryResult> {
    if (this.loadedByName.has(name)) {
      return fail(name, 'AlreadyLoaded', `Extension "${name}" is already loaded`);
    }

    const factory = this.catalog.get(name);
    if (!factory) {
      return fail(name, 'NotFound', `No extension named "${name}"`);
    }

    let extension: Extension;
    try {
      extension = await factory(this.context);
    } catch (err) {
      this.log?.warn({ extension: name, err: errorMessage(err) }, 'extensions:constructor failed');
      return fail(name, 'LoadFailed', `Extension "${name}" failed to load: ${errorMessage(err)}`);
    }

    const commandNames = extension.commands.map((c) => c.data.name);
    const seen = new Set<string>();
    for (const commandName of commandNames) {
      const owner = this.commandOwners.get(commandName)?.extension;
      if (owner || seen.has(commandName)) {
        return fail(
          name,
          'CommandConflict',
          `Command "/${commandName}" of extension "${name}" is already registered by "${owner ?? name}"`,
        );
      }
      seen.add(commandName);
    }

    try {
      await extension.setup?.();
    } catch (err) {
      this.log?.warn({ extension: name, err: errorMessage(err) }, 'extensions:setup failed');
      return fail(name, 'LoadFailed', `Extension "${name}" failed to load: ${errorMessage(err)}`);
    }

    for (const command of extension.commands) {
      this.commandOwners.set(command.data.name, { extension: name, command });
    }
    this.loadedByName.set(name, { extension, commandNames });
    this.log?.info({ extension: name, commands: commandNames }, 'extensions:loaded');
    return { ok: true, name, commands: commandNames };
  }

  private async unloadUnlocked(name: string): Promise<RegistryResult> {
    const entry = this.loadedByName.get(name);
    if (!entry) {
      return fail(name, 'NotLoaded', `Extension "${name}" is not loaded`);
    }

    for (const commandName of entry.commandNames) {
      this.commandOwners.delete(commandName);
    }
    this.loadedByName.delete(name);

    // The extension is gone from the command surface either way; a failing
    // teardown is reported but does not keep it loaded.
    try {
      await entry.extension.teardown?.();
    } catch (err) {
      this.log?.warn({ extension: name, err: errorMessage(err) }, 'extensions:teardown failed');
    }

    this.log?.info({ extension: name, commands: entry.commandNames }, 'extensions:unloaded');
    return { ok: true, name, commands: entry.commandNames };
  }
}

/** Count of successful results, for startup summaries. */
export function countLoaded(results: readonly RegistryResult[]): number {
  return results.filter((r) => r.ok).length;
}
