/**
 * Template path placeholder
 *
 * `#{template}` is replaced literally by the absolute template path. There is
 * no escape syntax and replaced text is never scanned again.
 */

export const TEMPLATE_PLACEHOLDER = '#{template}';

export function substituteTemplatePath(content: string, templateDirectory: string): string {
  return content.split(TEMPLATE_PLACEHOLDER).join(templateDirectory);
}

/**
 * Files the substitution pass applies to
 */
export function isInlistFile(filename: string): boolean {
  return filename.startsWith('inlist');
}
