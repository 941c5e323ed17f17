#!/usr/bin/env node

import { runCli } from "./frontend/cli";
import * as cons from "./utils/console";
import { describeError } from "./utils/errorHandling";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((e: unknown) => {
    cons.error(`Error: ${describeError(e)}`);
    process.exitCode = 1;
  });
