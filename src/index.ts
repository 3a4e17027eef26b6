#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  console.error("[pitchdeck] Fatal error:", err);
  process.exitCode = 1;
}
