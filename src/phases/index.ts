import type { PhaseDefinition } from "../core/types";
import extraction from "./extraction";
import implementation from "./implementation";
import inventory from "./inventory";
import verification from "./verification";

export const defaultPhasePlan: PhaseDefinition[] = [
  inventory,
  extraction,
  implementation,
  verification,
];
