import type { PrivacyStatus } from "../config/schema.js";

export type AccessCredentials = {
  accessToken: string;
};

export interface CredentialProvider {
  /** Resolves undefined for an unknown account; refreshes an expired token first. */
  getCredentials(account: string): Promise<AccessCredentials | undefined>;
}

export type UploadRequest = {
  videoPath: string;
  title: string;
  description: string;
  category: string;
  tags: string[];
  privacyStatus: PrivacyStatus;
  thumbnailPath?: string;
  publishAt?: Date;
  madeForKids: boolean;
};

export type UploadResult = {
  videoId: string;
  url: string;
};

export interface Publisher {
  upload(
    credentials: AccessCredentials,
    request: UploadRequest,
    onProgress?: (fraction: number) => void
  ): Promise<UploadResult>;
}
