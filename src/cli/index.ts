#!/usr/bin/env node

import { startServer } from "../mcp/server.js";
import { colorEnabled } from "./output.js";
import { runCli } from "./commands.js";

const code = await runCli(process.argv.slice(2), {
  color: colorEnabled(process.env, process.stdout.isTTY),
  serve: startServer,
});
process.exitCode = code;
