/**
 * Access capability of a client handle.
 *
 * `"rw"` handles can create, modify and delete resources; `"ro"` handles
 * (anonymous clients, or explicitly downgraded ones) can only read. The tag
 * is a type parameter on every handle, so mutation methods, which declare
 * a `this` of the `"rw"` type, do not type-check on read-only handles.
 * It is also kept at run time and checked once more on mutation.
 */
export type Access = "ro" | "rw";

export type ReadOnly = "ro";
export type ReadWrite = "rw";

export function assertWritable(access: Access): asserts access is ReadWrite {
  if (access !== "rw") {
    throw new TypeError("Operation requires a read-write client");
  }
}
