// {{VARIABLE_NAME}} gets replaced with the string value.
export function applyTemplateVariables(template: string, variables: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(variables)) {
    output = output.split(`{{${key}}}`).join(value);
  }
  return output;
}
