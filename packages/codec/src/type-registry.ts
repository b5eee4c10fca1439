import { typeNameOf } from "./describable.js";
import type { Loadable, LoadableType, TypeResolver } from "./types.js";

export type LoadableFactory = () => Loadable;

/**
 * Maps stored type names to zero-argument factories.
 *
 * Typed reads (`reader.readObject(Child)`) never need it; untyped reads
 * (`reader.readObject()`) resolve the type name found in the object header,
 * which lets a list hold several concrete types.
 *
 * ```ts
 * const registry = createTypeRegistry(Circle, Square);
 * const shapes = fromBytes(bytes, Drawing, { registry });
 * ```
 */
export class TypeRegistry implements TypeResolver {
  private readonly factories = new Map<string, LoadableFactory>();

  /**
   * Register a default-constructible type under the name its instances
   * write to the header.
   */
  register(type: LoadableType): this {
    const name = typeNameOf(new type());
    return this.registerFactory(name, () => new type());
  }

  /** The first factory registered for a name wins. */
  registerFactory(typeName: string, factory: LoadableFactory): this {
    if (!this.factories.has(typeName)) {
      this.factories.set(typeName, factory);
    }
    return this;
  }

  has(typeName: string): boolean {
    return this.factories.has(typeName);
  }

  create(typeName: string): Loadable | undefined {
    return this.factories.get(typeName)?.();
  }

  get typeNames(): string[] {
    return [...this.factories.keys()];
  }
}

export function createTypeRegistry(...types: LoadableType[]): TypeRegistry {
  const registry = new TypeRegistry();
  for (const type of types) {
    registry.register(type);
  }
  return registry;
}
