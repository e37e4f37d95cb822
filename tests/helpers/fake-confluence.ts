import type { ConfluenceSpace } from '../../src/types/index.js';

export interface FakePage {
  id: string;
  title: string;
  spaceKey: string;
  version: number;
  body: string;
  ancestors: string[];
}

export interface FakeAttachment {
  id: string;
  pageId: string;
  title: string;
  version: number;
  mediaType: string;
  comment?: string;
  data: string;
}

export interface RecordedCall {
  method: string;
  path: string;
  query: URLSearchParams;
}

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function text(message: string, status: number): Response {
  return new Response(message, { status });
}

/**
 * In-process stand-in for the Confluence REST API, installed in place of
 * the global fetch. Keeps spaces, pages and attachments in memory and
 * records every call it receives.
 */
export class FakeConfluence {
  readonly calls: RecordedCall[] = [];
  readonly spaces: ConfluenceSpace[] = [];
  readonly pages = new Map<string, FakePage>();
  readonly attachments = new Map<string, FakeAttachment>();
  private nextId = 1000;
  private expectedAuth: string;

  constructor(
    readonly baseUrl = 'https://wiki.test',
    credentials = { username: 'tester', password: 'test-secret' },
    private pageSize = 2
  ) {
    const encoded = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
    this.expectedAuth = `Basic ${encoded}`;
  }

  addSpace(key: string, name: string): this {
    this.spaces.push({ key, name });
    return this;
  }

  seedPage(title: string, spaceKey: string, body = '', version = 1): FakePage {
    const page: FakePage = { id: this.newId(), title, spaceKey, version, body, ancestors: [] };
    this.pages.set(page.id, page);
    return page;
  }

  writes(): RecordedCall[] {
    return this.calls.filter((call) => call.method !== 'GET');
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? 'GET';
    const headers = new Headers(init?.headers);
    const path = url.pathname.replace(/^\/rest\/api/, '');
    this.calls.push({ method, path, query: url.searchParams });

    if (headers.get('authorization') !== this.expectedAuth) {
      return text('Unauthorized', 401);
    }
    return this.route(method, path, url.searchParams, init?.body);
  };

  private newId(): string {
    return String(this.nextId++);
  }

  private paged<T>(items: T[], query: URLSearchParams): Response {
    const start = Number(query.get('start') ?? 0);
    const limit = Math.min(Number(query.get('limit') ?? 25), this.pageSize);
    const results = items.slice(start, start + limit);
    const next = start + limit < items.length ? `?start=${start + limit}` : undefined;
    return json({ results, _links: next ? { next } : {} });
  }

  private pageJson(page: FakePage) {
    return {
      id: page.id,
      type: 'page',
      title: page.title,
      space: { key: page.spaceKey },
      version: { number: page.version },
      body: { storage: { value: page.body, representation: 'storage' } },
    };
  }

  private attachmentJson(attachment: FakeAttachment) {
    return {
      id: attachment.id,
      type: 'attachment',
      title: attachment.title,
      version: { number: attachment.version },
      extensions: { mediaType: attachment.mediaType, comment: attachment.comment ?? '' },
    };
  }

  private async route(
    method: string,
    path: string,
    query: URLSearchParams,
    body: RequestInit['body']
  ): Promise<Response> {
    let match: RegExpMatchArray | null;

    if (method === 'GET' && path === '/user/current') {
      return json({ type: 'known', username: 'tester', displayName: 'Test User' });
    }

    if (method === 'GET' && path === '/space') {
      return this.paged(this.spaces, query);
    }

    if (method === 'GET' && (match = path.match(/^\/space\/([^/]+)$/))) {
      const key = decodeURIComponent(match[1]);
      const space = this.spaces.find((candidate) => candidate.key === key);
      return space ? json(space) : text(`No space with key : ${key}`, 404);
    }

    if (method === 'GET' && path === '/content') {
      const results = [...this.pages.values()].filter(
        (page) => page.title === query.get('title') && page.spaceKey === query.get('spaceKey')
      );
      return json({ results: results.map((page) => this.pageJson(page)), _links: {} });
    }

    if (method === 'POST' && path === '/content') {
      const payload = JSON.parse(String(body));
      const duplicate = [...this.pages.values()].some(
        (page) => page.title === payload.title && page.spaceKey === payload.space.key
      );
      if (duplicate) {
        return text('A page with this title already exists', 400);
      }
      const page = this.seedPage(payload.title, payload.space.key, payload.body.storage.value);
      page.ancestors = (payload.ancestors ?? []).map((ancestor: { id: string }) => ancestor.id);
      return json(this.pageJson(page));
    }

    if ((match = path.match(/^\/content\/(\d+)$/))) {
      return this.content(method, match[1], body);
    }

    if ((match = path.match(/^\/content\/(\d+)\/child\/attachment$/))) {
      const pageId = match[1];
      if (!this.pages.has(pageId)) {
        return text(`No content with id ${pageId}`, 404);
      }
      if (method === 'GET') {
        const fileName = query.get('filename');
        const attachments = [...this.attachments.values()].filter(
          (attachment) =>
            attachment.pageId === pageId && (fileName === null || attachment.title === fileName)
        );
        return this.paged(
          attachments.map((attachment) => this.attachmentJson(attachment)),
          query
        );
      }
      if (method === 'POST') {
        return this.createAttachment(pageId, body);
      }
    }

    if (method === 'POST' && (match = path.match(/^\/content\/(\d+)\/child\/attachment\/(\d+)\/data$/))) {
      const attachment = this.attachments.get(match[2]);
      if (!attachment || attachment.pageId !== match[1]) {
        return text(`No attachment with id ${match[2]}`, 404);
      }
      const upload = await this.readUpload(body);
      if (!upload) {
        return text('Missing file part', 400);
      }
      attachment.version += 1;
      attachment.data = upload.data;
      attachment.comment = upload.comment;
      return json(this.attachmentJson(attachment));
    }

    return text(`Unhandled route ${method} ${path}`, 500);
  }

  private content(method: string, id: string, body: RequestInit['body']): Response {
    const page = this.pages.get(id);
    const attachment = this.attachments.get(id);

    if (method === 'GET' && page) {
      return json(this.pageJson(page));
    }

    if (method === 'PUT' && page) {
      const payload = JSON.parse(String(body));
      if (payload.version.number !== page.version + 1) {
        return text(`Version must be incremented when updating a page. Current Version is: ${page.version}`, 409);
      }
      page.version = payload.version.number;
      page.body = payload.body.storage.value;
      return json(this.pageJson(page));
    }

    if (method === 'DELETE' && page) {
      this.pages.delete(id);
      for (const [attachmentId, candidate] of this.attachments) {
        if (candidate.pageId === id) {
          this.attachments.delete(attachmentId);
        }
      }
      return new Response(null, { status: 204 });
    }

    if (method === 'DELETE' && attachment) {
      this.attachments.delete(id);
      return new Response(null, { status: 204 });
    }

    return text(`No content with id ${id}`, 404);
  }

  private async createAttachment(pageId: string, body: RequestInit['body']): Promise<Response> {
    const upload = await this.readUpload(body);
    if (!upload) {
      return text('Missing file part', 400);
    }
    const exists = [...this.attachments.values()].some(
      (attachment) => attachment.pageId === pageId && attachment.title === upload.fileName
    );
    if (exists) {
      return text(`Cannot add a new attachment with same file name as an existing attachment: ${upload.fileName}`, 400);
    }
    const attachment: FakeAttachment = {
      id: this.newId(),
      pageId,
      title: upload.fileName,
      version: 1,
      mediaType: 'text/plain',
      comment: upload.comment,
      data: upload.data,
    };
    this.attachments.set(attachment.id, attachment);
    return json({ results: [this.attachmentJson(attachment)], size: 1 });
  }

  private async readUpload(
    body: RequestInit['body']
  ): Promise<{ fileName: string; data: string; comment?: string } | null> {
    if (!(body instanceof FormData)) {
      return null;
    }
    const file = body.get('file');
    if (file === null || typeof file === 'string') {
      return null;
    }
    const comment = body.get('comment');
    return {
      fileName: file.name,
      data: await file.text(),
      comment: typeof comment === 'string' ? comment : undefined,
    };
  }
}
