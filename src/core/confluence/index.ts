export { ConfluenceClient, type ConfluenceClientOptions } from './client.js';
export {
  ConfluencePageBuilder,
  CHART_KINDS,
  HEADING_LEVELS,
  TOC_TYPES,
  WARNING_KINDS,
  type ChartKind,
  type ChartOptions,
  type CodeBlockOptions,
  type HeadingLevel,
  type TableOfContentsOptions,
  type TableOptions,
  type TocType,
  type WarningKind,
  type WarningOptions,
} from './page-builder.js';
export { DataTable } from './table.js';
