#!/usr/bin/env node
import { defaultIo, runMeshbridgeCli } from "./meshbridgeCli.js";

async function main() {
  try {
    process.exitCode = await runMeshbridgeCli(process.argv.slice(2), defaultIo);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`meshbridge failed: ${message}\n`);
    process.exitCode = 1;
  }
}

void main();
