#!/usr/bin/env node
import { run } from "./cli";

run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
