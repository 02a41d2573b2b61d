import { ExtractionError } from "../errors";

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

/** Replaces `{name}` placeholders; an unknown placeholder is an extraction failure. */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new ExtractionError(`template "${template}" references unknown placeholder {${name}}`);
    }
    return value;
  });
}

export function groupVariables(groups: readonly (string | undefined)[]): Record<string, string> {
  const variables: Record<string, string> = {};
  groups.forEach((group, index) => {
    if (group !== undefined) variables[String(index)] = group;
  });
  return variables;
}
