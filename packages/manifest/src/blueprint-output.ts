/**
 * Flat output names for compiled Blueprint files
 */

/**
 * `src/session/view.blp` with base `src` and output `out` gives
 * `out/session-view.ui`.
 */
export function blueprintOutputPath(inputFile: string, baseInputDir: string, outputDir: string): string {
  let output = inputFile.endsWith('.blp') ? inputFile.slice(0, -'.blp'.length) : inputFile;
  output += '.ui';

  const prefix = `${baseInputDir.replace(/\/+$/, '')}/`;
  if (output.startsWith(prefix)) {
    output = output.slice(prefix.length);
  }

  return `${outputDir}/${output.replace(/\//g, '-')}`;
}
