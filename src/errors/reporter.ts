import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";
import { RelayError } from "./errors.js";

export function formatDiagnostic(diag: Diagnostic): string {
  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold("error")
      : diag.severity === "warning"
        ? chalk.yellow.bold("warning")
        : chalk.blue.bold("info");

  let output = `${severityLabel}[${diag.code}]: ${chalk.bold(diag.message)}\n`;
  if (diag.event !== undefined) {
    output += `  ${chalk.blue("-->")} event '${diag.event}'\n`;
  }
  if (diag.data !== undefined) {
    output += `  ${chalk.blue("|")} ${diag.data}\n`;
  }
  if (diag.help) {
    output += `  ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(d)).join("\n");
}

export function formatError(e: unknown): string {
  if (e instanceof RelayError) {
    let output = `${chalk.red.bold("Error")}[${e.code}]: ${e.message}`;
    if (e.cause instanceof Error) {
      output += `\n  ${chalk.blue("caused by")}: ${e.cause.message}`;
    }
    return output;
  }
  return `${chalk.red.bold("Error")}: ${e instanceof Error ? e.message : String(e)}`;
}
