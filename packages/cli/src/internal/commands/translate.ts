import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import type { Diagnostic, TargetArch, TargetProfile } from "@winzig/compiler";
import { formatDiagnostic, translate, withProfileOverrides, zigProfile } from "@winzig/compiler";
import { readCorpus } from "@winzig/reader";

import type { ProjectConfig } from "../config.js";
import { loadProjectContext } from "../config.js";

export const REPORT_FILE_NAME = "winzig.report.json";

export type TranslateArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly print?: (line: string) => void;
};

export type TranslateSummary = {
  readonly outDir: string;
  readonly files: readonly string[];
  readonly errorCount: number;
  readonly aborted: boolean;
};

type ReportDiagnostic = {
  readonly severity: Diagnostic["severity"];
  readonly code: string;
  readonly kind: string;
  readonly qualifiedName?: string;
  readonly message: string;
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
};

type Report = {
  readonly schema: 1;
  readonly target: TargetArch;
  readonly aborted: boolean;
  readonly files: readonly string[];
  readonly counts: { readonly error: number; readonly warning: number; readonly note: number };
  readonly diagnostics: readonly ReportDiagnostic[];
};

type TranslateFlags = {
  readonly config?: string;
  readonly arch?: TargetArch;
  readonly out?: string;
};

export function parseTranslateFlags(argv: readonly string[]): TranslateFlags {
  let config: string | undefined;
  let arch: TargetArch | undefined;
  let out: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if (flag !== "--config" && flag !== "--arch" && flag !== "--out") {
      throw new Error(`Unknown flag '${flag ?? ""}'.`);
    }
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`${flag} requires a value.`);
    }
    i++;
    if (flag === "--config") config = value;
    else if (flag === "--out") out = value;
    else if (value === "x86_64" || value === "x86") arch = value;
    else throw new Error(`--arch must be 'x86_64' or 'x86'.`);
  }
  return { config, arch, out };
}

export function profileFor(config: ProjectConfig, arch: TargetArch): TargetProfile {
  const { pointerSyntax, overrides } = config.target;
  return withProfileOverrides(zigProfile(arch), { ...overrides, ...(pointerSyntax ? { pointerSyntax } : {}) });
}

function toReportDiagnostic(d: Diagnostic): ReportDiagnostic {
  return {
    severity: d.severity,
    code: d.code,
    kind: d.kind,
    ...(d.qualifiedName !== undefined ? { qualifiedName: d.qualifiedName } : {}),
    message: d.message,
    ...(d.span ? { file: d.span.fileName, line: d.span.line, column: d.span.column } : {}),
  };
}

function count(diagnostics: readonly Diagnostic[], severity: Diagnostic["severity"]): number {
  return diagnostics.filter((d) => d.severity === severity).length;
}

export async function runTranslate(args: TranslateArgs): Promise<TranslateSummary> {
  const print = args.print ?? ((line: string) => console.error(line));
  const flags = parseTranslateFlags(args.argv);
  const { projectRoot, config } = loadProjectContext(args.dir, flags.config);
  const arch = flags.arch ?? config.target.arch;

  const read = readCorpus(resolve(projectRoot, config.input));
  const result = translate(read.corpus, profileFor(config, arch), {
    unresolved: config.unresolved,
    ...(config.link?.defaultLibrary ? { defaultLibrary: config.link.defaultLibrary } : {}),
    ...(config.cfg ? { cfg: config.cfg } : {}),
    ...(config.header ? { header: config.header } : {}),
  });

  const diagnostics = [...read.diagnostics, ...result.diagnostics];
  for (const d of diagnostics) print(formatDiagnostic(d));

  const outDir = resolve(projectRoot, flags.out ?? config.out);
  mkdirSync(outDir, { recursive: true });
  for (const unit of result.modules) {
    const path = join(outDir, unit.fileName);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, unit.text, "utf-8");
  }

  const errorCount = count(diagnostics, "error");
  const report: Report = {
    schema: 1,
    target: arch,
    aborted: result.aborted,
    files: result.modules.map((m) => m.fileName),
    counts: { error: errorCount, warning: count(diagnostics, "warning"), note: count(diagnostics, "note") },
    diagnostics: diagnostics.map(toReportDiagnostic),
  };
  writeFileSync(join(outDir, REPORT_FILE_NAME), JSON.stringify(report, null, 2) + "\n", "utf-8");

  if (result.aborted) print("Translation aborted: conflicting declarations.");
  return { outDir, files: report.files, errorCount, aborted: result.aborted };
}
