export { PdfOutlineExtractor } from './core/pdf-outline-extractor';
export { OutlineDocumentLoader } from './core/outline-document-loader';
export { OutlineWalker } from './walkers/outline-walker';
export type { OutlineWalkerOptions } from './walkers/outline-walker';
export { OutlineArena } from './walkers/outline-arena';
export type { OutlineArenaNode } from './walkers/outline-arena';
export { DestinationResolver } from './resolvers/destination-resolver';
export type {
  Destination,
  DestinationSource,
} from './resolvers/destination-resolver';
export { TitleDecoder } from './decoders/title-decoder';
export { PdfLibObjectGraph } from './graph/pdf-object-graph';
export type { PdfObjectGraph } from './graph/pdf-object-graph';
export {
  MalformedPdfError,
  NotAPdfError,
  OutlineReadError,
  PdfFileNotFoundError,
  UnexpectedOutlineError,
} from './errors/outline-read-error';
export {
  DEFAULT_WALKER_LIMITS,
  NAMED_PAGE_PATTERN,
  OUTLINE_WALKER,
  PDF_LOAD_OPTIONS,
} from './config/constants';
export type { OutlineWalkerLimits } from './config/constants';
