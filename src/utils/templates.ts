// simple variable substitution for text templates:
// {{VARIABLE_NAME}} gets replaced with the string value.

import * as path from "node:path";

export function applyTemplateVariables(template: string, variables: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(variables)) {
    output = output.split(`{{${key}}}`).join(value);
  }
  return output;
}

// does not check for existence
export function getPathRelativeToTemplates(more: string): string {
  return path.resolve(__dirname, "..", "..", "templates", more);
}
