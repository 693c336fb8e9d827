export interface HTMLShellOptions {
  lang?: string;
  /** Markup placed just before </body> */
  bodyEnd?: string;
}

/**
 * Wraps rendered body markup in a complete HTML document
 */
export function createHTMLShell(
  content: string,
  headContent: string,
  options: HTMLShellOptions = {},
): string {
  const bodyEnd = options.bodyEnd ? `${options.bodyEnd}\n` : "";
  return `<!DOCTYPE html>
<html lang="${options.lang ?? "en"}">
<head>
    ${headContent}
</head>
<body>
${content}
${bodyEnd}</body>
</html>
`;
}
