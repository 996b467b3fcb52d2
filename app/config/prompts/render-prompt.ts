/**
 * Fill {{variable}} placeholders. Unknown variables are left as-is.
 */
export function renderPromptTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match
  );
}
