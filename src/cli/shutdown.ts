/**
 * Cleanup hooks run by the SIGINT/SIGTERM handler before the process exits
 */

type ShutdownHook = () => Promise<void>;

const hooks: ShutdownHook[] = [];

export function onShutdown(hook: ShutdownHook): () => void {
  hooks.push(hook);
  return () => {
    const index = hooks.indexOf(hook);
    if (index >= 0) hooks.splice(index, 1);
  };
}

/** Runs every hook, newest first; failures are collected, not thrown. */
export async function runShutdownHooks(): Promise<unknown[]> {
  const failures: unknown[] = [];
  for (const hook of [...hooks].reverse()) {
    try {
      await hook();
    } catch (error) {
      failures.push(error);
    }
  }
  hooks.length = 0;
  return failures;
}
