import type {
  Describable,
  FormattableValue,
  ListItemPart,
  Loadable,
  Part,
  PartFormatter,
  Scalar,
} from "./types.js";

export function isDescribable(value: unknown): value is Describable {
  return (
    typeof value === "object" &&
    value !== null &&
    "schemaVersion" in value &&
    typeof value.schemaVersion === "number" &&
    "describe" in value &&
    typeof value.describe === "function"
  );
}

export function isLoadable(value: unknown): value is Loadable {
  return isDescribable(value) && "load" in value && typeof value.load === "function";
}

/** Name written to the object header for `value`. */
export function typeNameOf(value: Describable): string {
  return value.typeName ?? value.constructor.name;
}

function isList(value: FormattableValue): value is ReadonlyArray<Scalar | Describable> {
  return Array.isArray(value);
}

function listItem(value: Scalar | Describable): ListItemPart {
  // Arrays inside a list are opaque scalars, not nested lists
  return isDescribable(value) ? { kind: "nested", value } : { kind: "scalar", value };
}

/**
 * The formatter handed to every `describe()` call. Classification happens
 * here once, so consumers switch on `Part.kind` instead of re-testing values.
 */
export const partFormatter: PartFormatter = {
  format(name: string, value: FormattableValue): Part {
    if (isDescribable(value)) {
      return { kind: "nested", name, value };
    }
    if (isList(value)) {
      return { kind: "list", name, items: value.map(listItem) };
    }
    return { kind: "scalar", name, value };
  },
};
