/**
 * In-process stand-ins for xcodebuild and lipo used by the tests.
 *
 * The fake xcodebuild writes `lib<name>.a` containing `archive:<arch>` into
 * CONFIGURATION_BUILD_DIR. The fake lipo concatenates its inputs and reports
 * the `archive:` lines of a file as its architectures.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Exec } from "../types.js";

export type FakeCall = {
  readonly command: string;
  readonly args: readonly string[];
};

export type FakeToolchainOptions = {
  readonly name: string;
  readonly skipArchs?: readonly string[]; // Build "succeeds" without output
  readonly failArch?: string; // Build exits non-zero
  readonly interruptArch?: string; // Build is killed by SIGINT
  readonly onBuild?: (arch: string) => void;
};

export type FakeToolchain = {
  readonly exec: Exec;
  readonly calls: FakeCall[];
};

const valueAfter = (args: readonly string[], flag: string): string | undefined => {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
};

const setting = (args: readonly string[], key: string): string | undefined =>
  args.find((a) => a.startsWith(`${key}=`))?.slice(key.length + 1);

export const createFakeToolchain = (options: FakeToolchainOptions): FakeToolchain => {
  const calls: FakeCall[] = [];

  const exec: Exec = (command, args) => {
    calls.push({ command, args: [...args] });

    if (command === "xcodebuild") {
      const arch = valueAfter(args, "-arch") ?? "unknown";
      options.onBuild?.(arch);
      if (arch === options.interruptArch) {
        return { status: null, signal: "SIGINT", stdout: "", stderr: "" };
      }
      if (arch === options.failArch) {
        return { status: 65, stdout: "", stderr: "** BUILD FAILED **" };
      }
      const dir = setting(args, "CONFIGURATION_BUILD_DIR");
      if (dir && !options.skipArchs?.includes(arch)) {
        mkdirSync(dir, { recursive: true });
        writeFileSync(join(dir, `lib${options.name}.a`), `archive:${arch}\n`, "utf-8");
      }
      return { status: 0, stdout: "** BUILD SUCCEEDED **", stderr: "" };
    }

    if (command === "lipo" && args[0] === "-create") {
      const outIndex = args.indexOf("-output");
      const inputs = args.slice(1, outIndex);
      const output = args[outIndex + 1];
      if (!output) return { status: 1, stdout: "", stderr: "no output" };
      writeFileSync(
        output,
        inputs.map((input) => readFileSync(input, "utf-8")).join(""),
        "utf-8"
      );
      return { status: 0, stdout: "", stderr: "" };
    }

    if (command === "lipo" && args[0] === "-archs") {
      const file = args[1];
      if (!file || !existsSync(file)) {
        return { status: 1, stdout: "", stderr: "can't open input file" };
      }
      const archs = readFileSync(file, "utf-8")
        .split("\n")
        .filter((line) => line.startsWith("archive:"))
        .map((line) => line.slice("archive:".length));
      return { status: 0, stdout: `${archs.join(" ")}\n`, stderr: "" };
    }

    return { status: 127, stdout: "", stderr: `${command}: command not found` };
  };

  return { exec, calls };
};
