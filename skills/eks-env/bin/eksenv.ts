#!/usr/bin/env node

import { runCli } from "../src/cli.js";

runCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
