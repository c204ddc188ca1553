import {
  patternPatch,
  unionPatch,
  valuePatch,
  type Patch,
} from "./environment.js";
import { builtinName } from "./names.js";

const MAX_TUPLE_SIZE = 9;

const tuples = Array.from({ length: MAX_TUPLE_SIZE + 1 }, (_, size) => ({
  name: `_Tuple${size}`,
  arity: size,
}));

const listConstructors = [
  { name: "[]", arity: 0 },
  { name: "::", arity: 2 },
];

const primitiveTypes = ["List", "Int", "Float", "Char", "Bool", "String"];

/**
 * Names every module sees without importing anything: tuple and list
 * constructors and the primitive types.
 */
export const BUILTIN_PATCHES: readonly Patch[] = Object.freeze([
  ...[...tuples, ...listConstructors].map(({ name }) =>
    valuePatch(name, builtinName(name))
  ),
  ...[...tuples.map(({ name }) => name), ...primitiveTypes].map((name) =>
    unionPatch(name, builtinName(name))
  ),
  ...[...tuples, ...listConstructors].map(({ name, arity }) =>
    patternPatch(name, builtinName(name), arity)
  ),
]);
