export const statusSymbols = {
  ok: '✓',
  error: '✗',
  skipped: '⊘',
};
