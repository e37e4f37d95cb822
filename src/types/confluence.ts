export interface ConfluenceConfig {
  baseUrl: string;
  username: string;
  password: string;
}

export interface ConfluenceSpace {
  key: string;
  name: string;
}

export interface ConfluencePage {
  id: string;
  title: string;
  spaceKey: string;
  version: number;
  body?: string;
}

export interface ConfluenceAttachment {
  id: string;
  title: string;
  mediaType: string;
  version: number;
  comment?: string;
}

export interface ConfluenceUser {
  username: string;
  displayName: string;
}

export interface SpaceOptions {
  /** Treat the `space` argument as a space key instead of a display name. */
  spaceNameAsKey?: boolean;
}

export interface AddPageOptions extends SpaceOptions {
  body?: string;
  parentTitle?: string;
}

export interface AttachmentOptions extends SpaceOptions {
  comment?: string;
}
