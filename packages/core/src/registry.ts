import { RESERVED_TAGS } from "./constants";
import { FormatError, RegistryConflictError } from "./errors";
import { componentLogger, type Logger } from "./logger";
import type {
  RegistryBuilder,
  TypeDefinition,
  TypeDescriptor,
  TypeRegistry,
} from "./types/registry";

/**
 * Collects descriptors until `build` seals them into a read-only registry.
 *
 * Registering the same descriptor object twice under one tag is a no-op; a
 * different descriptor under a taken tag, or a tag the format layer reserves
 * for itself, raises `RegistryConflictError`.
 */
export const createRegistryBuilder = (): RegistryBuilder => {
  const descriptors = new Map<string, TypeDescriptor>();
  let sealed = false;

  const builder: RegistryBuilder = {
    register(tag, descriptor) {
      if (sealed) {
        throw new FormatError(
          `Cannot register "${tag}" after the registry was built`,
          "REGISTRY_SEALED",
          { context: { tag } }
        );
      }

      if (tag.length === 0) {
        throw new RegistryConflictError(tag, "tag must not be empty");
      }

      if (RESERVED_TAGS.has(tag)) {
        throw new RegistryConflictError(tag, "tag is reserved by the format layer");
      }

      const existing = descriptors.get(tag);
      if (existing === undefined) {
        descriptors.set(tag, descriptor);
      } else if (existing !== descriptor) {
        throw new RegistryConflictError(tag, "a different descriptor is already registered");
      }

      return builder;
    },

    build() {
      sealed = true;
      const snapshot = new Map(descriptors);
      const tags = Object.freeze([...snapshot.keys()]);

      return Object.freeze({
        resolve: (tag: string) => snapshot.get(tag),
        has: (tag: string) => snapshot.has(tag),
        tags: () => tags,
      });
    },
  };

  return Object.freeze(builder);
};

/**
 * Eagerly builds a registry from every known type definition.
 */
export const createTypeRegistry = (
  definitions: Iterable<TypeDefinition>,
  logger: Logger = componentLogger("registry")
): TypeRegistry => {
  const builder = createRegistryBuilder();

  for (const { tag, descriptor } of definitions) {
    builder.register(tag, descriptor);
  }

  const registry = builder.build();
  logger.debug({ tags: registry.tags() }, "type registry built");
  return registry;
};

export const emptyRegistry: TypeRegistry = createRegistryBuilder().build();
