#!/usr/bin/env node
// ffidl executable

import { main } from "./cli.ts";

process.exitCode = await main(process.argv.slice(2));
