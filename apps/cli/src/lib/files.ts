import fg from 'fast-glob';

/**
 * Expand glob patterns to .docx file paths. Plain paths are kept as given.
 */
export async function expandGlobs(patterns: string[], cwd: string = process.cwd()): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      const matches = await fg(pattern, { absolute: true, cwd });
      for (const file of matches.sort()) {
        if (file.endsWith('.docx')) {
          files.push(file);
        }
      }
    } else {
      files.push(pattern);
    }
  }

  return [...new Set(files)];
}
