export type { OutlineRecord } from './outline-record';
export type {
  NoOutlineReason,
  OutlineExtraction,
  OutlineFound,
  OutlineNotFound,
} from './outline-extraction';
export type { OutputFormat, RenderOptions } from './render-options';
