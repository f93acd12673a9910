import { getInjectedParams, isInjectable } from './decorators';

export type Constructor<T> = abstract new (...args: never[]) => T;
export type Token<T = unknown> = string | Constructor<T>;
type FactoryFunction<T> = () => T;

interface Binding {
  factory: FactoryFunction<unknown>;
  singleton: boolean;
  instance?: unknown;
}

/**
 * Token -> factory container. Tokens are interface names ('IEventSink') or
 * classes. bindClass() resolves constructor parameters from @Inject tokens
 * first, then from emitted parameter types of @Injectable classes.
 */
export class DIContainer {
  private bindings = new Map<Token, Binding>();
  private static instance: DIContainer;

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  bind<T>(token: Token<T>, factory: FactoryFunction<T>, singleton: boolean = true): void {
    this.bindings.set(token, { factory, singleton });
  }

  bindClass<T>(token: Token<T>, constructor: Constructor<T>, singleton: boolean = true): void {
    this.bind<T>(
      token,
      () => {
        const paramTypes: unknown = Reflect.getMetadata('design:paramtypes', constructor);
        const types: unknown[] = Array.isArray(paramTypes) ? paramTypes : [];
        const injected = getInjectedParams(constructor);

        const args = types.map((type, index) => {
          const explicit = injected.find((p) => p.index === index);
          if (explicit) return this.get(explicit.token);

          if (isConstructor(type) && this.has(type)) return this.get(type);
          if (isConstructor(type) && isInjectable(type)) {
            this.bindClass(type, type);
            return this.get(type);
          }
          throw new Error(`Cannot resolve parameter #${index} of ${constructor.name}`);
        });

        return Reflect.construct(constructor, args);
      },
      singleton,
    );
  }

  get<T>(token: Token<T>): T {
    const binding = this.bindings.get(token);

    if (!binding) {
      throw new Error(`No binding found for token: ${tokenName(token)}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance as T;
    }

    const instance = binding.factory();

    if (binding.singleton) {
      binding.instance = instance;
    }

    return instance as T;
  }

  has(token: Token): boolean {
    return this.bindings.has(token);
  }

  unbind(token: Token): void {
    this.bindings.delete(token);
  }

  clear(): void {
    this.bindings.clear();
  }
}

function isConstructor(value: unknown): value is Constructor<unknown> {
  return typeof value === 'function';
}

function tokenName(token: Token): string {
  return typeof token === 'string' ? token : token.name;
}

export const container = DIContainer.getInstance();
