/**
 * DEV-only diagnostics.
 * All exports are no-ops when `import.meta.env.DEV` is false,
 * so production builds drop the console traffic.
 */

/** Forward a warning to console.warn (DEV only). */
export function devWarn(...args: unknown[]) {
  if (!import.meta.env.DEV) return;
  console.warn('[match]', ...args);
}
