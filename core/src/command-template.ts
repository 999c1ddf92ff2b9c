/**
 * Command templates: `my-planner --problem {instance}`.
 *
 * The template is split on whitespace first and placeholders are substituted
 * per token, so a substituted value (a path with spaces) stays one argument.
 */

import { ConfigurationError } from "./errors.js";

const LOG_PREFIX = "planwire-core:command-template";

const PLACEHOLDER_RE = /\{([a-zA-Z][a-zA-Z0-9_]*)\}/g;

export interface RenderedCommand {
  command: string;
  args: string[];
}

/** Placeholder names used by a template, in order of first appearance. */
export function templatePlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

/**
 * Check a template before it is used: non-empty, every placeholder known,
 * every required placeholder present.
 *
 * @throws ConfigurationError
 */
export function validateCommandTemplate(
  template: string,
  params: { allowed: readonly string[]; required?: readonly string[] }
): void {
  if (!template.trim()) {
    throw new ConfigurationError({ message: `${LOG_PREFIX}:validate - Empty command template` });
  }
  const used = templatePlaceholders(template);
  const unknown = used.filter((name) => !params.allowed.includes(name));
  if (unknown.length > 0) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:validate - Unknown placeholder(s) ${unknown.map((n) => `{${n}}`).join(", ")} in "${template}"`,
      details: { template, unknown, allowed: params.allowed },
    });
  }
  const missing = (params.required ?? []).filter((name) => !used.includes(name));
  if (missing.length > 0) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:validate - Missing placeholder(s) ${missing.map((n) => `{${n}}`).join(", ")} in "${template}"`,
      details: { template, missing },
    });
  }
}

/**
 * Substitute placeholders and split into command + args.
 *
 * @throws ConfigurationError when a placeholder has no value
 */
export function renderCommandTemplate(
  template: string,
  values: Readonly<Record<string, string>>
): RenderedCommand {
  const tokens = template.trim().split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    throw new ConfigurationError({ message: `${LOG_PREFIX}:render - Empty command template` });
  }
  const rendered = tokens.map((token) =>
    token.replace(PLACEHOLDER_RE, (_whole, name: string) => {
      const value = values[name];
      if (value === undefined) {
        throw new ConfigurationError({
          message: `${LOG_PREFIX}:render - No value for placeholder {${name}} in "${template}"`,
        });
      }
      return value;
    })
  );
  const [command, ...args] = rendered;
  return { command, args };
}

/** Shell-style rendering for logs and reports. */
export function formatCommand(rendered: RenderedCommand): string {
  return [rendered.command, ...rendered.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
