import type { FieldDescriptor, FieldShape, MergeTarget } from "../types/index.ts";

export type FieldShapes = Readonly<Record<string, FieldShape>>;

const FIELD_SHAPES: ReadonlySet<string> = new Set<FieldShape>(["scalar", "sequence", "text"]);

export function isMergeTarget(value: unknown): value is MergeTarget {
  return (
    typeof value === "object" &&
    value !== null &&
    "describeField" in value &&
    typeof value.describeField === "function" &&
    "getField" in value &&
    typeof value.getField === "function" &&
    "setField" in value &&
    typeof value.setField === "function"
  );
}

function isFieldShapes(value: unknown): value is FieldShapes {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((shape) => typeof shape === "string" && FIELD_SHAPES.has(shape))
  );
}

/**
 * Shapes declared on the object's class, e.g.
 *   class Plugger { static configFields = { tags: "sequence", title: "text" } }
 */
function declaredShapes(object: object): FieldShapes | undefined {
  const ctor: unknown = object.constructor;
  if (typeof ctor !== "function" || !("configFields" in ctor)) return undefined;
  return isFieldShapes(ctor.configFields) ? ctor.configFields : undefined;
}

export function inferShape(value: unknown): FieldShape {
  if (Array.isArray(value)) return "sequence";
  if (typeof value === "string") return "text";
  return "scalar";
}

/** Own or inherited property descriptor, not looking at Object.prototype. Methods are skipped. */
function findDescriptor(object: object, name: string): PropertyDescriptor | undefined {
  for (
    let current: object | null = object;
    current !== null && current !== Object.prototype;
    current = Object.getPrototypeOf(current)
  ) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) return typeof descriptor.value === "function" ? undefined : descriptor;
  }
  return undefined;
}

/**
 * Build a MergeTarget over a plain class instance.
 *
 * A field exists when it is a property of the object (own or inherited) or is
 * declared in `fields` / the class's static `configFields`. Declared shapes win;
 * otherwise the shape is inferred from the current value. Methods are not
 * fields, even when declared.
 *
 * Writability comes from the property descriptor. TypeScript `readonly` is
 * erased at run time, so a read-only field has to be a getter without a
 * setter, or the object frozen, to be reported as not writable.
 */
export function reflectTarget(object: object, fields?: FieldShapes): MergeTarget {
  const shapes = fields ?? declaredShapes(object) ?? {};

  return {
    describeField(name: string): FieldDescriptor | undefined {
      const declared = Object.hasOwn(shapes, name) ? shapes[name] : undefined;
      const descriptor = findDescriptor(object, name);
      if (!descriptor && (!declared || typeof Reflect.get(object, name) === "function")) return undefined;

      let writable: boolean;
      if (!descriptor) writable = Object.isExtensible(object);
      else if ("value" in descriptor || "writable" in descriptor) writable = descriptor.writable === true;
      else writable = descriptor.set !== undefined;

      return { shape: declared ?? inferShape(Reflect.get(object, name)), writable };
    },

    getField(name: string): unknown {
      return Reflect.get(object, name);
    },

    setField(name: string, value: unknown): void {
      Reflect.set(object, name, value);
    },
  };
}

export function toTarget(object: object): MergeTarget {
  return isMergeTarget(object) ? object : reflectTarget(object);
}
