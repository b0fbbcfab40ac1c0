/**
 * `presets` command — list the built-in scenario presets.
 */

import { listPresets } from "../engine/presets.ts";

export function formatPresetList(): string[] {
  return listPresets().map((p) =>
    `  ${p.name.padEnd(14)} ${p.kind.padEnd(9)} ${p.description}`
  );
}

export function presetsCommand(json: boolean): number {
  if (json) {
    console.log(JSON.stringify(listPresets(), null, 2));
    return 0;
  }
  console.log("\nBuilt-in presets:\n");
  for (const line of formatPresetList()) console.log(line);
  console.log("");
  return 0;
}
