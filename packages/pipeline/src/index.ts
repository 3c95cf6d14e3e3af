/**
 * @changedoc/pipeline main entry point
 * Chunking, context extraction, prompt assembly and analysis orchestration
 */

export { chunkText, chunkContent, createSourceDocument, reconstructText } from "./services/chunker";
export { extractContext } from "./services/contextExtractor";
export { assemblePromptUnit, measureUnit, renderPrompt } from "./services/pairingAssembler";
export { analyzeUnits, mergeResults, toRenderableSections } from "./services/AnalysisOrchestrator";
export { generateDocument, planSubmission } from "./services/DocumentGenerationService";
export { createLlmAnalyst, createConfiguredAnalyst } from "./services/LLMAnalyst";
export { renderWordDocument, outputFileName } from "./services/docx/WordDocumentRenderer";
export { parseMarkdownBlocks } from "./services/docx/markdownBlocks";

export type { ExtractOptions } from "./services/contextExtractor";
export type { UnitAnalyst, AnalysisCall, OrchestratorOptions } from "./services/AnalysisOrchestrator";
export type { SubmissionPlan, GenerateOptions, GenerationResult } from "./services/DocumentGenerationService";
export type { MarkdownBlock, TextSpan } from "./services/docx/markdownBlocks";
