import { formatErrorMessage } from "../../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface InterruptHooks {
  // Returns a function that removes the handler.
  onSignal(signal: NodeJS.Signals, handler: () => void): () => void;
  exit(code: number): void;
}

export const processInterrupts: InterruptHooks = {
  onSignal(signal, handler) {
    process.once(signal, handler);
    return () => {
      process.removeListener(signal, handler);
    };
  },
  exit(code) {
    process.exit(code);
  },
};

export function interruptExitCode(signal: NodeJS.Signals): number {
  return signal === "SIGTERM" ? 143 : 130;
}

// =============================================================================
// HANDLERS
// =============================================================================

// The first signal runs `cleanup` once, then exits with 128 + signal number.
export function attachInterruptHandlers(
  hooks: InterruptHooks,
  cleanup: (signal: NodeJS.Signals) => Promise<void>,
  warn: (message: string) => void,
): () => void {
  const detachers: Array<() => void> = [];
  const detachAll = () => {
    for (const detach of detachers.splice(0)) detach();
  };

  for (const signal of INTERRUPT_SIGNALS) {
    detachers.push(
      hooks.onSignal(signal, () => {
        detachAll();
        void cleanup(signal).then(
          () => hooks.exit(interruptExitCode(signal)),
          (error: unknown) => {
            warn(`Warning: cleanup after ${signal} failed: ${formatErrorMessage(error)}`);
            hooks.exit(interruptExitCode(signal));
          },
        );
      }),
    );
  }

  return detachAll;
}
