#!/usr/bin/env node
// ─── Validate Scenarios ────────────────────────────────────────────
// CLI script that validates every .scenario.yaml file: the document
// against the schema, then a full build of its criteria trees.
// Exits 0 if all pass, 1 if any fail.

import { readdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  ConfigurationError,
  createScenario,
  loadScenarioFile,
  type SimulatorApi,
} from "../packages/engine/src/index.js";

const SCENARIOS_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "scenarios");

// Builds trees only; nothing is ticked, so no command reaches it.
const OFFLINE_SIMULATOR: SimulatorApi = {
  setColor: () => true,
  resetColor: () => true,
  setArrow: () => true,
  resetArrows: () => true,
  currentTime: () => 0,
  speedOf: () => undefined,
};

async function main(): Promise<void> {
  const entries = await readdir(SCENARIOS_DIR);
  const files = entries
    .filter((f) => f.endsWith(".scenario.yaml") || f.endsWith(".scenario.yml"))
    .sort();

  if (files.length === 0) {
    console.error("No .scenario.yaml files found in scenarios/");
    process.exit(1);
  }

  console.log(`\nValidating ${files.length} scenario(s)...\n`);

  let failed = 0;

  for (const file of files) {
    try {
      const document = await loadScenarioFile(join(SCENARIOS_DIR, file));
      createScenario(document, { simulator: OFFLINE_SIMULATOR }).dispose();
      console.log(`  ✅ ${file}`);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) {
        throw err;
      }
      console.error(`  ❌ ${file}`);
      const lines = err.issues.length > 0 ? err.issues : [err.message];
      for (const line of lines) {
        console.error(`     ${line}`);
      }
      failed++;
    }
  }

  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${files.length} scenario(s) failed validation.`);
    process.exit(1);
  }

  console.log(`All ${files.length} scenario(s) passed validation.`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
