#!/usr/bin/env node
import { main } from "../src/cli";

process.exitCode = main(process.argv.slice(2));
