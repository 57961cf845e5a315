export { DxfEntityExtractor, extractDrawing } from './extractor';
export type { ExtractionResult } from './extractor';
