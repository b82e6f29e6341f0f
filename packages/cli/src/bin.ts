#!/usr/bin/env tsx
import { CLI } from "./cli.js";

const cli = new CLI();
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
