type Factory<Services extends object, T> = (container: Container<Services>) => T;

interface Provider<Services extends object, T> {
  factory: Factory<Services, T>;
  singleton: boolean;
}

type ServiceKey<Services extends object> = keyof Services & string;

/**
 * Typed service container. The `Services` map fixes which keys exist and what
 * each one resolves to, so lookups need no casts.
 */
export class Container<Services extends object> {
  private readonly providers: { [K in keyof Services]?: Provider<Services, Services[K]> } = {};
  private readonly singletons: { [K in keyof Services]?: { value: Services[K] } } = {};

  register<K extends ServiceKey<Services>>(
    key: K,
    factory: Factory<Services, Services[K]>,
    options?: { singleton?: boolean }
  ): void {
    assertKey(key);
    this.providers[key] = {
      factory,
      singleton: options?.singleton ?? false
    };
    this.singletons[key] = undefined;
  }

  registerValue<K extends ServiceKey<Services>>(key: K, value: Services[K]): void {
    assertKey(key);
    this.providers[key] = {
      factory: () => value,
      singleton: true
    };
    this.singletons[key] = { value };
  }

  has(key: ServiceKey<Services>): boolean {
    return Object.hasOwn(this.providers, key);
  }

  resolve<K extends ServiceKey<Services>>(key: K): Services[K] {
    const provider = Object.hasOwn(this.providers, key) ? this.providers[key] : undefined;
    if (!provider) {
      throw new Error(`No provider registered for: ${key}`);
    }

    if (!provider.singleton) {
      return provider.factory(this);
    }

    const cached = this.singletons[key];
    if (cached) {
      return cached.value;
    }

    const value = provider.factory(this);
    this.singletons[key] = { value };
    return value;
  }
}

function assertKey(key: unknown): void {
  if (typeof key !== 'string' || !key) {
    throw new Error('Service key must be a non-empty string');
  }
}
