import { readFile } from 'fs/promises';
import { basename } from 'path';
import {
  AmbiguousResultError,
  ConflictError,
  NotFoundError,
  TransportError,
} from '../errors.js';
import type {
  AddPageOptions,
  AttachmentOptions,
  ConfluenceAttachment,
  ConfluenceConfig,
  ConfluencePage,
  ConfluenceSpace,
  ConfluenceUser,
  SpaceOptions,
} from '../../types/index.js';

export interface ConfluenceClientOptions {
  onRequest?: (method: string, endpoint: string, context?: string) => void;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  headers?: Record<string, string>;
  body?: string | FormData;
}

interface ContentResponse {
  id: string;
  title: string;
  version?: { number: number };
  body?: { storage?: { value: string } };
}

interface AttachmentResponse {
  id: string;
  title: string;
  version?: { number: number };
  metadata?: { mediaType?: string; comment?: string };
  extensions?: { mediaType?: string; comment?: string };
}

interface PagedResponse<T> {
  results: T[];
  _links?: { next?: string };
}

const PAGE_SIZE = 100;

function storageBody(value: string) {
  return { storage: { value, representation: 'storage' } };
}

function toPage(content: ContentResponse, spaceKey: string): ConfluencePage {
  return {
    id: content.id,
    title: content.title,
    spaceKey,
    version: content.version?.number ?? 1,
    body: content.body?.storage?.value,
  };
}

function toAttachment(attachment: AttachmentResponse): ConfluenceAttachment {
  const meta = attachment.extensions ?? attachment.metadata ?? {};
  return {
    id: attachment.id,
    title: attachment.title,
    mediaType: meta.mediaType ?? '',
    version: attachment.version?.number ?? 1,
    comment: meta.comment || undefined,
  };
}

/**
 * Client for the Confluence REST API (`/rest/api`).
 *
 * Spaces, pages and attachments are addressed by name. Every operation
 * resolves those names again before acting, so nothing read by an earlier
 * call is reused.
 */
export class ConfluenceClient {
  private baseUrl: string;
  private apiUrl: string;
  private authHeader: string;
  private onRequest?: (method: string, endpoint: string, context?: string) => void;

  constructor(config: ConfluenceConfig, options: ConfluenceClientOptions = {}) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.apiUrl = `${this.baseUrl}/rest/api`;
    const credentials = Buffer.from(`${config.username}:${config.password}`).toString('base64');
    this.authHeader = `Basic ${credentials}`;
    this.onRequest = options.onRequest;
  }

  private async send(
    endpoint: string,
    options: RequestOptions = {},
    context?: string
  ): Promise<Response> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: 'application/json',
    };
    // fetch sets the multipart boundary itself for FormData bodies
    if (typeof options.body === 'string') {
      headers['Content-Type'] = 'application/json';
    }

    this.onRequest?.(method, endpoint, context);

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}${endpoint}`, {
        method,
        headers: { ...headers, ...options.headers },
        body: options.body,
      });
    } catch (error) {
      throw new TransportError(`Confluence API request failed: ${method} ${endpoint}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw this.toError(response.status, errorText, context ?? `${method} ${endpoint}`);
    }

    return response;
  }

  private async request<T>(
    endpoint: string,
    options: RequestOptions = {},
    context?: string
  ): Promise<T> {
    const response = await this.send(endpoint, options, context);
    const text = await response.text();
    const described = context ?? `${options.method ?? 'GET'} ${endpoint}`;
    if (!text) {
      throw new TransportError(`Confluence API returned an empty body in ${described}`, {
        status: response.status,
        body: text,
      });
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      // Login pages of SSO proxies answer 200 with HTML
      throw new TransportError(`Confluence API returned a non-JSON body in ${described}`, {
        cause: error,
        status: response.status,
        body: text,
      });
    }
  }

  private toError(status: number, body: string, context: string): Error {
    const message = `Confluence API error (${status}) in ${context}: ${body}`;
    if (status === 404) {
      return new NotFoundError(message);
    }
    // Duplicate titles and file names come back as 400 on most versions
    if (status === 409 || (status === 400 && /already exists|same file name/i.test(body))) {
      return new ConflictError(message);
    }
    return new TransportError(message, { status, body });
  }

  private async collect<T>(endpoint: string, context?: string): Promise<T[]> {
    const results: T[] = [];
    const separator = endpoint.includes('?') ? '&' : '?';
    let start = 0;
    let hasNext = false;

    do {
      const response = await this.request<PagedResponse<T>>(
        `${endpoint}${separator}start=${start}&limit=${PAGE_SIZE}`,
        {},
        context
      );
      results.push(...response.results);
      start += response.results.length;
      hasNext = Boolean(response._links?.next) && response.results.length > 0;
    } while (hasNext);

    return results;
  }

  async verifyUser(): Promise<ConfluenceUser> {
    const user = await this.request<{ username: string; displayName: string }>(
      '/user/current',
      {},
      'verifyUser'
    );
    return { username: user.username, displayName: user.displayName };
  }

  async getSpaces(): Promise<ConfluenceSpace[]> {
    const spaces = await this.collect<{ key: string; name: string }>('/space', 'getSpaces');
    return spaces.map((space) => ({ key: space.key, name: space.name }));
  }

  async resolveSpaceKey(spaceName: string, options: SpaceOptions = {}): Promise<string> {
    if (options.spaceNameAsKey) {
      const space = await this.request<{ key: string }>(
        `/space/${encodeURIComponent(spaceName)}`,
        {},
        `resolveSpaceKey: "${spaceName}"`
      );
      return space.key;
    }

    const matches = (await this.getSpaces()).filter((space) => space.name === spaceName);
    if (matches.length === 0) {
      throw new NotFoundError(`Space not found: "${spaceName}"`);
    }
    if (matches.length > 1) {
      throw new AmbiguousResultError(
        `${matches.length} spaces are named "${spaceName}", address it by key instead`
      );
    }
    return matches[0].key;
  }

  private async findPages(title: string, spaceKey: string): Promise<ContentResponse[]> {
    const response = await this.request<PagedResponse<ContentResponse>>(
      `/content?type=page&title=${encodeURIComponent(title)}&spaceKey=${encodeURIComponent(spaceKey)}&expand=version`,
      {},
      `findPages: "${title}" in ${spaceKey}`
    );
    return response.results.filter((page) => page.title === title);
  }

  private async lookupPage(title: string, spaceKey: string): Promise<ContentResponse> {
    const matches = await this.findPages(title, spaceKey);
    if (matches.length === 0) {
      throw new NotFoundError(`Page not found: "${title}" in space ${spaceKey}`);
    }
    if (matches.length > 1) {
      throw new AmbiguousResultError(`${matches.length} pages titled "${title}" in space ${spaceKey}`);
    }
    return matches[0];
  }

  private async locatePage(
    title: string,
    space: string,
    options: SpaceOptions
  ): Promise<ConfluencePage> {
    const spaceKey = await this.resolveSpaceKey(space, options);
    return toPage(await this.lookupPage(title, spaceKey), spaceKey);
  }

  async resolvePageId(title: string, space: string, options: SpaceOptions = {}): Promise<string> {
    return (await this.locatePage(title, space, options)).id;
  }

  async getPage(title: string, space: string, options: SpaceOptions = {}): Promise<ConfluencePage> {
    const located = await this.locatePage(title, space, options);
    const response = await this.request<ContentResponse>(
      `/content/${located.id}?expand=body.storage,version`,
      {},
      `getPage: "${title}"`
    );
    return toPage(response, located.spaceKey);
  }

  async getPageContents(title: string, space: string, options: SpaceOptions = {}): Promise<string> {
    return (await this.getPage(title, space, options)).body ?? '';
  }

  async addPage(title: string, space: string, options: AddPageOptions = {}): Promise<string> {
    const spaceKey = await this.resolveSpaceKey(space, options);
    const existing = await this.findPages(title, spaceKey);
    if (existing.length > 0) {
      throw new ConflictError(`A page titled "${title}" already exists in space ${spaceKey}`);
    }

    const payload: {
      type: 'page';
      title: string;
      space: { key: string };
      body: ReturnType<typeof storageBody>;
      ancestors?: Array<{ id: string }>;
    } = {
      type: 'page',
      title,
      space: { key: spaceKey },
      body: storageBody(options.body ?? ''),
    };

    if (options.parentTitle) {
      const parent = await this.lookupPage(options.parentTitle, spaceKey);
      payload.ancestors = [{ id: parent.id }];
    }

    const context = `addPage: "${title}" (body: ${payload.body.storage.value.length} chars)`;
    const response = await this.request<ContentResponse>(
      '/content',
      { method: 'POST', body: JSON.stringify(payload) },
      context
    );
    return response.id;
  }

  /**
   * Replaces the body of a page. The version read during resolution is
   * sent back incremented; a concurrent edit in between makes the API
   * reject the write with a ConflictError.
   */
  async updatePage(
    title: string,
    space: string,
    body: string,
    options: SpaceOptions = {}
  ): Promise<ConfluencePage> {
    const current = await this.locatePage(title, space, options);
    const context = `updatePage: "${title}" (pageId: ${current.id}, body: ${body.length} chars, version: ${current.version} -> ${current.version + 1})`;

    const response = await this.request<ContentResponse>(
      `/content/${current.id}`,
      {
        method: 'PUT',
        body: JSON.stringify({
          id: current.id,
          type: 'page',
          title: current.title,
          space: { key: current.spaceKey },
          body: storageBody(body),
          version: { number: current.version + 1 },
        }),
      },
      context
    );

    return { ...toPage(response, current.spaceKey), body };
  }

  async deletePage(title: string, space: string, options: SpaceOptions = {}): Promise<void> {
    const pageId = await this.resolvePageId(title, space, options);
    await this.send(`/content/${pageId}`, { method: 'DELETE' }, `deletePage: "${title}"`);
  }

  private async findAttachments(pageId: string, fileName?: string): Promise<ConfluenceAttachment[]> {
    const filter = fileName ? `&filename=${encodeURIComponent(fileName)}` : '';
    const attachments = await this.collect<AttachmentResponse>(
      `/content/${pageId}/child/attachment?expand=version${filter}`,
      `findAttachments: pageId ${pageId}`
    );
    return attachments
      .filter((attachment) => fileName === undefined || attachment.title === fileName)
      .map(toAttachment);
  }

  private async locateAttachment(pageId: string, fileName: string): Promise<ConfluenceAttachment> {
    const [attachment] = await this.findAttachments(pageId, fileName);
    if (!attachment) {
      throw new NotFoundError(`Attachment not found: "${fileName}" on page ${pageId}`);
    }
    return attachment;
  }

  async getAttachments(
    title: string,
    space: string,
    options: SpaceOptions = {}
  ): Promise<ConfluenceAttachment[]> {
    const pageId = await this.resolvePageId(title, space, options);
    return this.findAttachments(pageId);
  }

  private async postAttachment(
    endpoint: string,
    filePath: string,
    fileName: string,
    comment: string | undefined,
    context: string
  ): Promise<ConfluenceAttachment> {
    const fileBuffer = await readFile(filePath);
    const formData = new FormData();
    formData.append('file', new Blob([new Uint8Array(fileBuffer)]), fileName);
    if (comment) {
      formData.append('comment', comment);
    }

    const response = await this.request<AttachmentResponse | PagedResponse<AttachmentResponse>>(
      endpoint,
      {
        method: 'POST',
        headers: { 'X-Atlassian-Token': 'nocheck' },
        body: formData,
      },
      `${context} (size: ${fileBuffer.length} bytes)`
    );

    // Creation answers with a result list, a new version with the attachment itself
    const attachment = 'results' in response ? response.results[0] : response;
    if (!attachment) {
      throw new TransportError(`Confluence returned no attachment for ${context}`);
    }
    return toAttachment(attachment);
  }

  async uploadAttachment(
    filePath: string,
    title: string,
    space: string,
    options: AttachmentOptions = {}
  ): Promise<ConfluenceAttachment> {
    const pageId = await this.resolvePageId(title, space, options);
    const fileName = basename(filePath);

    const existing = await this.findAttachments(pageId, fileName);
    if (existing.length > 0) {
      throw new ConflictError(
        `Attachment "${fileName}" already exists on page "${title}", use updateAttachment instead`
      );
    }

    return this.postAttachment(
      `/content/${pageId}/child/attachment`,
      filePath,
      fileName,
      options.comment,
      `uploadAttachment: "${fileName}" (pageId: ${pageId})`
    );
  }

  async updateAttachment(
    filePath: string,
    title: string,
    space: string,
    options: AttachmentOptions = {}
  ): Promise<ConfluenceAttachment> {
    const pageId = await this.resolvePageId(title, space, options);
    const fileName = basename(filePath);
    const current = await this.locateAttachment(pageId, fileName);

    return this.postAttachment(
      `/content/${pageId}/child/attachment/${current.id}/data`,
      filePath,
      fileName,
      options.comment,
      `updateAttachment: "${fileName}" (pageId: ${pageId}, version: ${current.version} -> ${current.version + 1})`
    );
  }

  async deleteAttachment(
    fileName: string,
    title: string,
    space: string,
    options: SpaceOptions = {}
  ): Promise<void> {
    const pageId = await this.resolvePageId(title, space, options);
    const attachment = await this.locateAttachment(pageId, fileName);
    await this.send(
      `/content/${attachment.id}`,
      { method: 'DELETE' },
      `deleteAttachment: "${fileName}" (pageId: ${pageId})`
    );
  }

  getPageUrl(pageId: string): string {
    return `${this.baseUrl}/pages/viewpage.action?pageId=${pageId}`;
  }
}
