/**
 * Per-execution control state shared by every consumer in one pipeline run.
 *
 * A fresh signal is created for each enumerator and for each push-mode run;
 * it is never reused. Any stage may call `stopFurtherProcessing()`, after
 * which the driver pulls nothing more from the source.
 */

export type SeqState = "notStarted" | "inProcess" | "finished";

/** Marks "no value yet" for slots whose element type may itself be undefined. */
export const NO_VALUE: unique symbol = Symbol("seqfuse.noValue");
export type NoValue = typeof NO_VALUE;

export class PipelineSignal {
  state: SeqState = "notStarted";
  private _halted = false;

  get halted(): boolean {
    return this._halted;
  }

  /** Permanent: a halted execution never resumes. */
  stopFurtherProcessing(): void {
    this._halted = true;
  }
}
