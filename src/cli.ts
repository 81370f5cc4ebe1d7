#!/usr/bin/env node
import { runCli } from "./app";

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    // eslint-disable-next-line no-console
    console.error("wfm-lookup: interrupted");
    controller.abort();
    process.exitCode = 130;
  });

  const code = await runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    env: process.env,
    // eslint-disable-next-line no-console
    stdout: (line) => console.log(line),
    // eslint-disable-next-line no-console
    stderr: (line) => console.error(line),
    signal: controller.signal,
  });
  if (!controller.signal.aborted) process.exitCode = code;
}

main().catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exitCode = 1;
});
