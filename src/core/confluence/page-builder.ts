import { InvalidArgumentError } from '../errors.js';
import type { CellValue, TabularData } from '../../types/index.js';

export const HEADING_LEVELS = [1, 2, 3, 4, 5, 6] as const;
export const WARNING_KINDS = ['note', 'tip', 'info', 'warning'] as const;
export const CHART_KINDS = ['line', 'pie', 'bar', 'area'] as const;
export const TOC_TYPES = ['list', 'flat'] as const;

export type HeadingLevel = (typeof HEADING_LEVELS)[number];
export type WarningKind = (typeof WARNING_KINDS)[number];
export type ChartKind = (typeof CHART_KINDS)[number];
export type TocType = (typeof TOC_TYPES)[number];

export interface TableOfContentsOptions {
  type?: TocType | (string & {});
  minLevel?: number;
  maxLevel?: number;
  /** CSS list-style for the bullets, e.g. `disc`, `circle`, `decimal`. */
  style?: string;
  /** Number headings as 1.1, 1.2, ... */
  outline?: boolean;
  /** CSS length added per heading level, e.g. `10px`. */
  indent?: string;
  include?: string;
  exclude?: string;
  printable?: boolean;
}

export interface WarningOptions {
  title?: string;
  icon?: boolean;
  /**
   * Treat the text as storage-format markup: it goes into the panel body
   * verbatim instead of escaped inside a paragraph.
   */
  markup?: boolean;
}

export interface CodeBlockOptions {
  language?: string;
  theme?: string;
  title?: string;
  lineNumbers?: boolean;
  collapse?: boolean;
}

export interface TableOptions {
  /** Render row keys as a leading header column. */
  index?: boolean;
  /** Escape cell text. Off by default so cells may carry markup. */
  escape?: boolean;
}

export interface ChartOptions {
  title?: string;
}

function isOneOf<T extends string | number>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

function escapeForCdata(text: string): string {
  // CDATA sections cannot contain "]]>"
  return text.replace(/\]\]>/g, ']]]]><![CDATA[>');
}

function formatCell(value: CellValue, escape: boolean): string {
  const text = value === null || value === undefined ? '' : String(value);
  return escape ? escapeXml(text) : text;
}

function macro(
  name: string,
  parameters: Array<[string, string | undefined]>,
  body = ''
): string {
  const rendered = parameters
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `<ac:parameter ac:name="${key}">${escapeXml(value)}</ac:parameter>`)
    .join('');
  return `<ac:structured-macro ac:name="${name}">${rendered}${body}</ac:structured-macro>`;
}

function renderTable(data: TabularData, options: TableOptions): string {
  const index = options.index ?? true;
  const escape = options.escape ?? false;

  let headerHtml = '<tr>';
  if (index) {
    headerHtml += '<th></th>';
  }
  for (const column of data.columns) {
    headerHtml += `<th>${formatCell(column, escape)}</th>`;
  }
  headerHtml += '</tr>';

  let bodyHtml = '';
  data.rows.forEach((rowKey, row) => {
    bodyHtml += '<tr>';
    if (index) {
      bodyHtml += `<th>${formatCell(rowKey, escape)}</th>`;
    }
    data.columns.forEach((_, column) => {
      bodyHtml += `<td>${formatCell(data.valueAt(row, column), escape)}</td>`;
    });
    bodyHtml += '</tr>';
  });

  return `<table><thead>${headerHtml}</thead><tbody>${bodyHtml}</tbody></table>`;
}

/**
 * Accumulates Confluence storage-format fragments into one page body.
 *
 * Arguments are validated before anything is appended, so a failed call
 * leaves the buffer as it was. Block fragments end with a newline; inline
 * ones (links, mentions, line breaks) do not.
 */
export class ConfluencePageBuilder {
  private fragments: string[] = [];

  private append(fragment: string): void {
    this.fragments.push(fragment);
  }

  addTitle(text: string, level: HeadingLevel | (number & {}) = 1): void {
    if (!isOneOf(HEADING_LEVELS, level)) {
      throw new InvalidArgumentError(`Unsupported heading level: ${level}, expected 1-6`, {
        argument: 'level',
      });
    }
    this.append(`<h${level}>${escapeXml(text)}</h${level}>\n`);
  }

  addTableOfContents(options: TableOfContentsOptions = {}): void {
    const type = options.type ?? 'list';
    const minLevel = options.minLevel ?? 1;
    const maxLevel = options.maxLevel ?? 6;

    if (!isOneOf(TOC_TYPES, type)) {
      throw new InvalidArgumentError(`Unsupported table of contents type: "${type}"`, {
        argument: 'type',
      });
    }
    if (!isOneOf(HEADING_LEVELS, minLevel) || !isOneOf(HEADING_LEVELS, maxLevel) || minLevel > maxLevel) {
      throw new InvalidArgumentError(`Invalid heading range: ${minLevel}-${maxLevel}`, {
        argument: 'minLevel/maxLevel',
      });
    }

    this.append(
      macro('toc', [
        ['type', type],
        ['minLevel', String(minLevel)],
        ['maxLevel', String(maxLevel)],
        ['style', options.style ?? 'disc'],
        ['outline', String(options.outline ?? false)],
        ['indent', options.indent ?? '0px'],
        ['include', options.include],
        ['exclude', options.exclude],
        ['printable', String(options.printable ?? true)],
      ]) + '\n'
    );
  }

  /** Adds a note, tip, info or warning panel. */
  addWarning(
    text: string,
    kind: WarningKind | (string & {}) = 'warning',
    options: WarningOptions = {}
  ): void {
    if (!isOneOf(WARNING_KINDS, kind)) {
      throw new InvalidArgumentError(
        `Unsupported warning kind: "${kind}", expected one of ${WARNING_KINDS.join(', ')}`,
        { argument: 'kind' }
      );
    }
    this.append(
      macro(
        kind,
        [
          ['title', options.title],
          ['icon', options.icon === false ? 'false' : undefined],
        ],
        `<ac:rich-text-body>${options.markup ? text : `<p>${escapeXml(text)}</p>`}</ac:rich-text-body>`
      ) + '\n'
    );
  }

  /** Language and theme are passed through; Confluence decides what it supports. */
  addCodeBlock(code: string, options: CodeBlockOptions = {}): void {
    this.append(
      macro(
        'code',
        [
          ['title', options.title],
          ['theme', options.theme],
          ['linenumbers', options.lineNumbers ? 'true' : undefined],
          ['language', options.language],
          ['collapse', options.collapse ? 'true' : undefined],
        ],
        `<ac:plain-text-body><![CDATA[${escapeForCdata(code)}]]></ac:plain-text-body>`
      ) + '\n'
    );
  }

  addTable(data: TabularData, options: TableOptions = {}): void {
    this.append(renderTable(data, options) + '\n');
  }

  addChart(data: TabularData, kind: ChartKind | (string & {}), options: ChartOptions = {}): void {
    if (!isOneOf(CHART_KINDS, kind)) {
      throw new InvalidArgumentError(
        `Unsupported chart kind: "${kind}", expected one of ${CHART_KINDS.join(', ')}`,
        { argument: 'kind' }
      );
    }
    const table = renderTable(data, { index: true, escape: true });
    this.append(
      macro(
        'chart',
        [
          ['title', options.title],
          ['type', kind],
        ],
        `<ac:rich-text-body>${table}</ac:rich-text-body>`
      ) + '\n'
    );
  }

  addNewLine(): void {
    this.append('<br/>');
  }

  /** Appended verbatim. */
  addCustomHtml(html: string): void {
    this.append(html);
  }

  addTagUser(username: string): void {
    this.append(`<ac:link><ri:user ri:username="${escapeXml(username)}"/></ac:link>`);
  }

  /** Without a space key the link points into the page's own space. */
  addPageLink(title: string, spaceKey?: string): void {
    const space = spaceKey ? ` ri:space-key="${escapeXml(spaceKey)}"` : '';
    this.append(`<ac:link><ri:page${space} ri:content-title="${escapeXml(title)}"/></ac:link>`);
  }

  /** The PDF has to be attached to the page the body is published to. */
  addPdfPreview(fileName: string): void {
    this.append(
      macro(
        'viewpdf',
        [],
        `<ac:parameter ac:name="name"><ri:attachment ri:filename="${escapeXml(fileName)}"/></ac:parameter>`
      ) + '\n'
    );
  }

  render(): string {
    return this.fragments.join('');
  }

  restart(): void {
    this.fragments = [];
  }
}
