#!/usr/bin/env -S tsx

import { runMagnetPullCli } from "../tools/magnet-pull-cli";

async function main() {
  const code = await runMagnetPullCli(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  });
  process.exitCode = code;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
