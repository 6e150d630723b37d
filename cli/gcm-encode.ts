#!/usr/bin/env -S tsx

import fs from "node:fs/promises";

import { GcmError } from "../shared/gcm-errors";
import { createLogger } from "../modules/core/log";
import { buildPlanet } from "../modules/gcm/planet-builder";
import {
  GCM_PARAMETERS_KEY,
  parseGcmProperties,
  parsePsgContent,
  unpackGcmPayload,
} from "../modules/gcm/psg-wire";

const log = createLogger("gcm-encode");

function parseArgs(): { jsonPath?: string; rawJson?: string } {
  const args = process.argv.slice(2);
  let jsonPath: string | undefined;
  let rawJson: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--json" && args[i + 1]) {
      jsonPath = args[i + 1];
      i += 1;
    } else if (token === "--params" && args[i + 1]) {
      rawJson = args[i + 1];
      i += 1;
    }
  }

  return { jsonPath, rawJson };
}

async function loadConfig(jsonPath?: string, rawJson?: string): Promise<unknown> {
  if (jsonPath) {
    const src = await fs.readFile(jsonPath, "utf8");
    return JSON.parse(src);
  }
  if (rawJson) {
    return JSON.parse(rawJson);
  }
  throw new Error("usage: gcm-encode --json <config.json> | --params '<json>'");
}

function fmt(n: number): string {
  if (!Number.isFinite(n)) return String(n);
  if (n !== 0 && (Math.abs(n) >= 1e4 || Math.abs(n) < 1e-3)) {
    return n.toExponential(4);
  }
  return n.toFixed(4);
}

async function main() {
  const { jsonPath, rawJson } = parseArgs();
  const config = await loadConfig(jsonPath, rawJson);

  const planet = buildPlanet(config);
  const content = planet.content;
  log.info(`encoded ${planet.flat.length} values into ${content.length} bytes`);

  console.log("=== Header ===");
  console.log(planet.headerText);
  console.log("");

  // Read the artifact back the way the simulator would.
  const { params, payload } = parsePsgContent(content);
  const grid = parseGcmProperties(params[GCM_PARAMETERS_KEY] ?? "");
  const blocks = unpackGcmPayload(grid, payload);

  console.log("=== Payload ===");
  const labelWidth = Math.max(...grid.variables.map((token) => token.length));
  for (const [token, values] of blocks) {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const value of values) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
    console.log(token.padEnd(labelWidth + 2), String(values.length).padStart(8), fmt(min), fmt(max));
  }
}

main().catch((err) => {
  if (err instanceof GcmError) {
    log.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
