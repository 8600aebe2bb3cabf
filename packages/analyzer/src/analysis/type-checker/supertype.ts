import { Type } from "#types";

/**
 * Smallest type admitting both `a` and `b`, if there is one.
 *
 * Unknown parts (the inner type of `none`, the missing side of `ok` or
 * `err`, the entry of an empty list) take the other side's type.
 */
export function leastSupertype(a: Type, b: Type): Type | undefined {
  if (Type.isNoType(a)) {
    return b;
  }
  if (Type.isNoType(b)) {
    return a;
  }

  if (Type.isOptional(a) && Type.isOptional(b)) {
    const inner = leastSupertype(a.inner, b.inner);
    return inner && Type.optional(inner);
  }

  if (Type.isResponse(a) && Type.isResponse(b)) {
    const ok = leastSupertype(a.ok, b.ok);
    const err = leastSupertype(a.err, b.err);
    return ok && err && Type.response(ok, err);
  }

  if (Type.isList(a) && Type.isList(b)) {
    const entry = leastSupertype(a.entry, b.entry);
    return entry && Type.list(entry, Math.max(a.maxLength, b.maxLength));
  }

  if (Type.isBuffer(a) && Type.isBuffer(b)) {
    return Type.buffer(Math.max(a.length, b.length));
  }

  if (Type.isTuple(a) && Type.isTuple(b)) {
    if (a.fields.size !== b.fields.size) {
      return undefined;
    }
    const fields: [string, Type][] = [];
    for (const [name, type] of a.fields) {
      const other = b.getFieldType(name);
      const field = other && leastSupertype(type, other);
      if (!field) {
        return undefined;
      }
      fields.push([name, field]);
    }
    return Type.tuple(fields);
  }

  return a.equals(b) ? a : undefined;
}
