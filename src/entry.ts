#!/usr/bin/env node
import process from "node:process";
import { runCli } from "./cli/run-main.js";

process.title = "gridcheck";

runCli(process.argv).catch((error: unknown) => {
  console.error(
    "[gridcheck] Failed to start CLI:",
    error instanceof Error ? (error.stack ?? error.message) : error,
  );
  process.exitCode = 1;
});
