/**
 * Human-facing progress of a run. The CLI prints these; tests and library
 * callers use the silent reporter.
 */
export interface ProgressReporter {
  phase(title: string): void;
  step(service: string, message: string): void;
  failure(service: string, message: string): void;
}

export const silentProgress: ProgressReporter = {
  phase: () => {},
  step: () => {},
  failure: () => {}
};
