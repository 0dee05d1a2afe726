#!/usr/bin/env -S node --import tsx
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { TranslateError, formatDiagnostic } from "@winzig/compiler";

import { runInit } from "./internal/commands/init.js";
import { runTranslate } from "./internal/commands/translate.js";

export type Cmd = "init" | "translate" | "help";

function usage(): void {
  console.log(
    [
      "winzig",
      "",
      "Usage:",
      "  winzig init",
      "  winzig translate [--config <winzig.json>] [--arch x86_64|x86] [--out <dir>]",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "init" || cmd === "translate" || cmd === "help") return cmd;
  return "help";
}

export function describeFailure(err: unknown): string {
  if (err instanceof TranslateError) {
    return formatDiagnostic({ severity: "error", code: err.code, kind: "InternalError", message: err.message, span: err.span });
  }
  if (err instanceof Error) return `error: ${err.message}`;
  return `error WZ0001: Unexpected failure: ${String(err)}`;
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "init":
        await runInit({ dir: cwd() });
        return;
      case "translate": {
        const summary = await runTranslate({ dir: cwd(), argv: argv.slice(3) });
        console.log(`Wrote ${summary.files.length} unit(s) to ${summary.outDir}.`);
        if (summary.errorCount > 0 || summary.aborted) exit(1);
        return;
      }
      default:
        usage();
        exit(1);
    }
  } catch (err: unknown) {
    console.error(describeFailure(err));
    exit(1);
  }
}

if (argv[1] && import.meta.url === pathToFileURL(argv[1]).href) {
  void main();
}
