import { describe, it, expect } from "vitest";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { execa } from "../../helpers/execa";
import { reservePort } from "../../helpers/tcp-stub";

const distCli = resolve(process.cwd(), "dist/cli.js");
const hasDist = existsSync(distCli);

const runIfDist = it.runIf(hasDist);

describe("cli", () => {
  runIfDist("should show help and exit 0", async () => {
    const result = await execa("node", [distCli, "run", "--help"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toContain("--suite");
  });

  runIfDist("should list built-in scenarios", async () => {
    const result = await execa("node", [distCli, "list"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toContain("missing-version");
    expect(result.stdout).toContain("upload-multiple");
  });

  runIfDist("should fail fast on an unknown suite", async () => {
    const result = await execa("node", [distCli, "run", "--suite", "fuzz", "--yes"]);

    expect(result.exitCode).not.toBe(0);
  });

  runIfDist("should report refused connections per scenario and still exit 0", async () => {
    const port = await reservePort();
    const result = await execa("node", [
      distCli,
      "run",
      "--host",
      "127.0.0.1",
      "--port",
      String(port),
      "--scenario",
      "get-static",
      "not-found",
      "--pause",
      "0",
      "--yes",
    ]);

    expect(result.exitCode).toBe(0);
    const failures = result.stdout
      .split("\n")
      .filter((line) => line.includes('"event":"scenario-failed"'));
    expect(failures).toHaveLength(2);
  });
});
