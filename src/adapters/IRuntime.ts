/**
 * A long-running transport loop the entry point can start and stop.
 */
export interface IRuntime {
  readonly name: string;

  /** Resolves once the runtime is accepting work (or, for one-shot runtimes, when the work is done). */
  start(): Promise<void>;

  /** Stop accepting work and release the transport. Safe to call twice. */
  stop(): Promise<void>;
}
