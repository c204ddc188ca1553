import {
  exposedAliasNames,
  exposedUnions,
  exposedValueNames,
  type ModuleInterface,
  type UnionInfo,
} from "./interface.js";

const pick = <V>(
  dict: ReadonlyMap<string, V>,
  names: readonly string[]
): Map<string, V> => {
  const picked = new Map<string, V>();
  names.forEach((name) => {
    const value = dict.get(name);
    if (value !== undefined) {
      picked.set(name, value);
    }
  });
  return picked;
};

/**
 * Projects an interface onto what its export list exposes. Unexported values,
 * aliases, unions and constructors are dropped. Restricting twice gives the
 * same interface as restricting once.
 */
export const restrictToPublicApi = (
  iface: ModuleInterface
): ModuleInterface => {
  const unions = new Map<string, UnionInfo>();
  const exposedCtorNames: string[] = [];

  exposedUnions(iface.exports).forEach(({ name, constructors: listing }) => {
    const union = iface.unions.get(name);
    if (!union) {
      return;
    }
    const constructors = listing.open
      ? union.constructors
      : union.constructors.filter((ctor) => listing.values.includes(ctor.name));
    unions.set(name, { typeParams: union.typeParams, constructors });
    exposedCtorNames.push(...constructors.map((ctor) => ctor.name));
  });

  return {
    ...iface,
    types: pick(iface.types, [
      ...exposedValueNames(iface.exports),
      ...exposedCtorNames,
    ]),
    aliases: pick(iface.aliases, exposedAliasNames(iface.exports)),
    unions,
  };
};
