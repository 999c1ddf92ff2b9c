/**
 * Unit tests for loadHarnessConfig.
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@planwire/core";
import { DEFAULT_COMMAND_TEMPLATE, loadHarnessConfig } from "./config.js";

describe("loadHarnessConfig", () => {
  it("should build the built-in endpoint by default", () => {
    expect(loadHarnessConfig({ env: {}, cwd: "/work" })).toEqual({
      executable: undefined,
      address: "0.0.0.0:2222",
      commandTemplate: DEFAULT_COMMAND_TEMPLATE,
      corpusPath: "/work/harness/corpus.json",
      build: { command: "npm run typecheck", executable: "/work/server/src/main.ts" },
      cwd: "/work",
    });
  });

  it("should read env and resolve paths against cwd", () => {
    const config = loadHarnessConfig({
      env: {
        HARNESS_EXECUTABLE: "bin/planner",
        HARNESS_ADDRESS: "127.0.0.1:7000",
        HARNESS_CORPUS: "/corpora/small.json",
        HARNESS_BUILD_COMMAND: "make",
      },
      cwd: "/work",
    });

    expect(config).toMatchObject({
      executable: "/work/bin/planner",
      address: "127.0.0.1:7000",
      corpusPath: "/corpora/small.json",
      build: { command: "make" },
    });
  });

  it("should let flags override env", () => {
    const config = loadHarnessConfig({
      overrides: { executable: "/opt/other", address: "10.1.1.1:2222" },
      env: { HARNESS_EXECUTABLE: "bin/planner", HARNESS_ADDRESS: "127.0.0.1:7000" },
      cwd: "/work",
    });

    expect(config.executable).toBe("/opt/other");
    expect(config.address).toBe("10.1.1.1:2222");
  });

  it("should reject a malformed address", () => {
    expect(() => loadHarnessConfig({ overrides: { address: "2222" }, env: {}, cwd: "/work" })).toThrow(
      ConfigurationError
    );
  });

  it("should reject a command template without {instance}", () => {
    expect(() =>
      loadHarnessConfig({ overrides: { commandTemplate: "{executable} --address {address}" }, env: {}, cwd: "/work" })
    ).toThrow(/Missing placeholder\(s\) \{instance\}/);
  });

  it("should reject an unknown placeholder", () => {
    expect(() =>
      loadHarnessConfig({ overrides: { commandTemplate: "{executable} {instance} {seed}" }, env: {}, cwd: "/work" })
    ).toThrow(/Unknown placeholder\(s\) \{seed\}/);
  });
});
