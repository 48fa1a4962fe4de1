/**
 * Best-effort name of the function that called into `depth` frames above this helper,
 * formatted as `<file>.<function>` (e.g., 'editor_view.save'). Returns '' when the
 * stack cannot be parsed. Diagnostics only.
 */
export function inferCallerSource(depth: number = 2): string {
  const stack = new Error().stack;
  if (!stack) return '';

  // Line 0 is "Error", line 1 is this function
  const frame = stack.split('\n')[depth + 1];
  if (!frame) return '';

  const match = /at (?:(?<fn>(?:new |async )?[^\s(]+) \()?(?<file>[^()]+?):\d+:\d+\)?\s*$/.exec(frame.trim());
  if (!match?.groups) return '';

  const file = match.groups['file'] ?? '';
  const moduleName = file.split(/[\\/]/).pop()?.replace(/\.[cm]?[jt]s$/, '') ?? '';
  const fn = match.groups['fn'] ?? '<anonymous>';

  if (!moduleName) return fn;
  return `${moduleName}.${fn.split('.').pop() ?? fn}`;
}
