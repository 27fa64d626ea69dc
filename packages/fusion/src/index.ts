/**
 * @seqfuse/fusion: Lazy sequence pipelines with consumer fusion
 *
 * A chain like `map → filter → take` composes into one consumer chain per
 * execution, driven in a single pass over the source. Adjacent map and
 * filter stages merge into one consumer, and stages can stop the source
 * early.
 *
 * @example
 * ```typescript
 * import { Seq, lazy, range } from "@seqfuse/fusion";
 *
 * // Data-first catalog
 * Seq.toArray(Seq.filter(n => n > 1, Seq.map(s => s.length, ["a", "bb", "ccc"]))); // [2, 3]
 *
 * // Fluent, with early termination
 * const first5Squares = range(1, Infinity)
 *   .map(x => x * x)
 *   .take(5)
 *   .toArray(); // [1, 4, 9, 16, 25]
 * ```
 */

export * as Seq from "./seq/index.js";
export type { DisposableResource } from "./seq/create.js";

export { LazySeq } from "./lazy.js";
export { lazy, range, iterate, repeat, generate } from "./lazy-entry.js";

// Engine
export { Sequence, PipelineEnumerator, runPipeline, enumerate, isSequence } from "./sequence.js";
export type { Step } from "./sequence.js";
export { Consumer, ResultSink, CallbackSink } from "./consumer.js";
export type { FusibleConsumer } from "./consumer.js";
export { Stage, MapStage, FilterStage, MapThenFilterStage, FilterThenMapStage } from "./stage.js";
export {
  StageFactory,
  IdentityFactory,
  ComposedFactory,
  StageFactoryOf,
  MapFactory,
  FilterFactory,
  identity,
  combine,
} from "./factory.js";
export { PipelineSignal, NO_VALUE } from "./signal.js";
export type { SeqState, NoValue } from "./signal.js";
export { EnumeratorBase, IterableEnumerator, EmptyEnumerator } from "./enumerator.js";
export type { Enumerator } from "./enumerator.js";
export { ConsList } from "./list.js";
export type { ConsCell } from "./list.js";
export { CachedSequence } from "./cache.js";
export { AppendSequence } from "./drivers/append.js";
export { ArraySequence, EmptySequence } from "./drivers/array.js";
export { InitSequence, MAX_INDEX } from "./drivers/init.js";
export { IterableSequence, fromGenerator } from "./drivers/iterable.js";
export { ListSequence } from "./drivers/list.js";
export { UnfoldSequence } from "./drivers/unfold.js";
export type { UnfoldGenerator } from "./drivers/unfold.js";
export { DelayedSequence } from "./drivers/delay.js";
