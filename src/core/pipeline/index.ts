/**
 * Extraction Pipeline Module
 *
 * Wires the locator, parser, grouper, analyzer, assembler and emitter into
 * one run over a checkout.
 *
 * @module
 */

export {
  ExtractionCoordinator,
  type ExtractionCoordinatorOptions,
  type ExtractionError,
  type ExtractionPhase,
  type ExtractionProgressEvent,
} from "./coordinator.js";
export { FileProcessor, type FileOutcome, type FileProcessorOptions } from "./file-processor.js";
export * from "./run-summary.js";
