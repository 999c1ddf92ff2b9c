import { describe, it, expect } from "vitest";
import {
  formatCommand,
  renderCommandTemplate,
  templatePlaceholders,
  validateCommandTemplate,
} from "./command-template.js";
import { ConfigurationError } from "./errors.js";

describe("command templates", () => {
  it("should list placeholders in order of first appearance", () => {
    expect(templatePlaceholders("{executable} --address {address} --file-path {instance} {address}")).toEqual([
      "executable",
      "address",
      "instance",
    ]);
  });

  it("should split on whitespace before substituting", () => {
    const rendered = renderCommandTemplate("planner --problem {instance}", { instance: "/tmp/my problems/a.json" });
    expect(rendered).toEqual({ command: "planner", args: ["--problem", "/tmp/my problems/a.json"] });
  });

  it("should substitute placeholders inside a token", () => {
    const rendered = renderCommandTemplate("planner --problem={instance}", { instance: "a.json" });
    expect(rendered.args).toEqual(["--problem=a.json"]);
  });

  it("should reject a placeholder without a value", () => {
    expect(() => renderCommandTemplate("planner {instance}", {})).toThrow(ConfigurationError);
  });

  it("should reject unknown placeholders", () => {
    expect(() => validateCommandTemplate("planner {problem_file}", { allowed: ["instance"] })).toThrow(
      /Unknown placeholder\(s\) \{problem_file\}/
    );
  });

  it("should reject templates missing a required placeholder", () => {
    expect(() =>
      validateCommandTemplate("planner --stdin", { allowed: ["instance"], required: ["instance"] })
    ).toThrow(/Missing placeholder\(s\) \{instance\}/);
  });

  it("should reject an empty template", () => {
    expect(() => validateCommandTemplate("   ", { allowed: [] })).toThrow(ConfigurationError);
  });

  it("should quote parts with spaces when formatting", () => {
    expect(formatCommand({ command: "planner", args: ["--problem", "my problem.json"] })).toBe(
      'planner --problem "my problem.json"'
    );
  });
});
