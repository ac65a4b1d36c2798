/** Typed key for a registered service. */
export interface Token<T> {
  readonly id: symbol;
  readonly name: string;
  /** Carries T for inference; never set. */
  readonly type?: T;
}

export function createToken<T>(name: string): Token<T> {
  if (!name.trim()) {
    throw new Error('Token name must be a non-empty string');
  }
  return { id: Symbol(name), name };
}

type Factory<T> = (container: Container) => T;

interface Provider {
  factory: Factory<unknown>;
  singleton: boolean;
}

export class Container {
  private readonly providers = new Map<symbol, Provider>();
  private readonly singletons = new Map<symbol, unknown>();

  register<T>(token: Token<T>, factory: Factory<T>, options?: { singleton?: boolean }): void {
    this.providers.set(token.id, {
      factory,
      singleton: options?.singleton ?? false
    });
    this.singletons.delete(token.id);
  }

  registerValue<T>(token: Token<T>, value: T): void {
    this.providers.set(token.id, {
      factory: () => value,
      singleton: true
    });
    this.singletons.set(token.id, value);
  }

  has<T>(token: Token<T>): boolean {
    return this.providers.has(token.id);
  }

  resolve<T>(token: Token<T>): T {
    const provider = this.providers.get(token.id);
    if (!provider) {
      throw new Error(`No provider registered for token: ${token.name}`);
    }

    if (provider.singleton) {
      if (this.singletons.has(token.id)) {
        return this.singletons.get(token.id) as T;
      }

      const instance = provider.factory(this) as T;
      this.singletons.set(token.id, instance);
      return instance;
    }

    return provider.factory(this) as T;
  }
}
