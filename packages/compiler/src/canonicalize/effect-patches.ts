import type { EffectManagerType, ModuleEffects } from "./ast.js";
import { valuePatch, type Patch } from "./environment.js";
import { topLevel, type CanonicalModuleName } from "./names.js";

const managerBindings: Record<EffectManagerType, readonly string[]> = {
  cmd: ["command"],
  sub: ["subscription"],
  fx: ["command", "subscription"],
};

/** Bindings the platform supplies for ports and effect managers. */
export const effectsToPatches = ({
  moduleName,
  effects,
}: {
  moduleName: CanonicalModuleName;
  effects: ModuleEffects;
}): Patch[] => {
  switch (effects.kind) {
    case "none":
      return [];
    case "ports":
      return effects.ports.map((port) =>
        valuePatch(port.name, topLevel(moduleName, port.name))
      );
    case "manager":
      return managerBindings[effects.managerType].map((name) =>
        valuePatch(name, topLevel(moduleName, name))
      );
  }
};
