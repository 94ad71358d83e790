/**
 * Names of snippets whose name or text contains `query`, ignoring case,
 * sorted by name. An empty query matches every snippet.
 */
export function filterSnippets(snippets: Readonly<Record<string, string>>, query: string): string[] {
  const needle = query.toLowerCase();
  return Object.keys(snippets)
    .filter(
      (name) => name.toLowerCase().includes(needle) || snippets[name].toLowerCase().includes(needle)
    )
    .sort();
}

/**
 * Text to insert for a snippet: the snippet itself, ending in a newline.
 * @returns undefined for an empty snippet, which inserts nothing
 */
export function prepareSnippetInsertion(snippet: string): string | undefined {
  if (!snippet) return undefined;
  return snippet.endsWith("\n") ? snippet : `${snippet}\n`;
}
