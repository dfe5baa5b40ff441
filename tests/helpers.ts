import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import type { FileDeployer, FileRestorer, ValidationReport, Validator } from "../src/types";

export const PASS: ValidationReport = { status: "PASS", errors: [], warnings: [] };

export function createTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `txdeploy-${label}-test-`));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }
}

/**
 * Mute console output from the logger for the current test
 */
export function silenceLogs(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

export class FakeValidator implements Validator {
  readonly calls: string[] = [];

  constructor(private readonly reports: Record<string, ValidationReport> = {}) {}

  async validate(filePath: string): Promise<ValidationReport> {
    this.calls.push(filePath);
    return this.reports[filePath] ?? PASS;
  }
}

export interface DeployCall {
  source: string;
  destination: string;
  checksum: string | null | undefined;
}

export class FakeDeployer implements FileDeployer {
  readonly calls: DeployCall[] = [];

  /** Return false or an Error for destinations that should fail */
  constructor(private readonly outcome: (destination: string) => boolean | Error = () => true) {}

  async deploy(source: string, destination: string, checksum?: string | null): Promise<boolean> {
    this.calls.push({ source, destination, checksum });
    const result = this.outcome(destination);
    if (result instanceof Error) throw result;
    return result;
  }
}

export class FakeRestorer implements FileRestorer {
  readonly calls: string[] = [];

  constructor(private readonly outcome: (destination: string) => boolean = () => true) {}

  async restore(destination: string): Promise<boolean> {
    this.calls.push(destination);
    return this.outcome(destination);
  }
}
