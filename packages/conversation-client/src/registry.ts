/**
 * ClientRegistry + ClientFactory — resolve a backend by name.
 *
 * The registry is an explicit object; nothing registers itself on import.
 * createDefaultRegistry() is the startup wiring for the bundled backends,
 * and tests build their own registries as needed.
 */
import type { ClientOptions } from "./client.ts";
import { InvalidArgumentError } from "./errors.ts";
import type { ConversationClient } from "./types.ts";
import { CerebrasClient } from "./backends/cerebras.ts";
import { MockConversationClient } from "./backends/mock.ts";
import { TestCerebrasClient } from "./backends/test-cerebras.ts";

export type ClientConstructor = new (options: ClientOptions) => ConversationClient;

// ── ClientRegistry ────────────────────────────────────────────────

export class ClientRegistry {
  private entries = new Map<string, ClientConstructor>();

  /** Overwrites an existing entry with the same name */
  register(name: string, ctor: ClientConstructor): void {
    this.entries.set(name, ctor);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** @throws InvalidArgumentError listing the registered names */
  resolve(name: string): ClientConstructor {
    const ctor = this.entries.get(name);
    if (!ctor) {
      const available = [...this.entries.keys()].join(", ");
      throw new InvalidArgumentError(`Client '${name}' not found. Available clients: ${available}`);
    }
    return ctor;
  }

  /** Snapshot of the registry; mutating it leaves the registry untouched */
  list(): Map<string, ClientConstructor> {
    return new Map(this.entries);
  }
}

export function createDefaultRegistry(): ClientRegistry {
  const registry = new ClientRegistry();
  registry.register("cerebras", CerebrasClient);
  registry.register("test", TestCerebrasClient);
  registry.register("mock", MockConversationClient);
  return registry;
}

// ── ClientFactory ─────────────────────────────────────────────────

export class ClientFactory {
  constructor(readonly registry: ClientRegistry = createDefaultRegistry()) {}

  /**
   * Construct the backend registered under `name`.
   * `apiKey` and `extra` reach the constructor unchanged.
   */
  create(name: string, apiKey?: string, extra: ClientOptions = {}): ConversationClient {
    const ctor = this.registry.resolve(name);
    const options: ClientOptions = apiKey === undefined ? { ...extra } : { ...extra, apiKey };
    return new ctor(options);
  }

  listAvailableClients(): Map<string, ClientConstructor> {
    return this.registry.list();
  }
}

let defaultFactory: ClientFactory | undefined;

/** Shorthand over a lazily created factory with the bundled backends */
export function createClient(
  name: string,
  apiKey?: string,
  extra: ClientOptions = {},
): ConversationClient {
  defaultFactory ??= new ClientFactory();
  return defaultFactory.create(name, apiKey, extra);
}
