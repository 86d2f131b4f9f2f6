import { google, type youtube_v3 } from "googleapis";

type UploadMedia = { mimeType: string; body: NodeJS.ReadableStream };

/** The slice of the YouTube Data API v3 client the publisher calls. */
export interface YouTubeClient {
  videos: {
    insert(
      params: { part: string[]; requestBody: youtube_v3.Schema$Video; media: UploadMedia },
      options?: { onUploadProgress?: (event: { bytesRead: number }) => void }
    ): Promise<{ data: youtube_v3.Schema$Video }>;
  };
  thumbnails: {
    set(params: { videoId: string; media: UploadMedia }): Promise<unknown>;
  };
}

/** The slice of `OAuth2Client` used to exchange a refresh token. */
export interface OAuthClient {
  setCredentials(credentials: { refresh_token: string }): void;
  getAccessToken(): Promise<{ token?: string | null }>;
  credentials: {
    refresh_token?: string | null;
    expiry_date?: number | null;
  };
}

export type YouTubeClientFactory = (accessToken: string) => YouTubeClient;
export type OAuthClientFactory = (clientId: string, clientSecret: string) => OAuthClient;

export const createYouTubeClient: YouTubeClientFactory = (accessToken) => {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  return google.youtube({ version: "v3", auth });
};

export const createOAuthClient: OAuthClientFactory = (clientId, clientSecret) =>
  new google.auth.OAuth2(clientId, clientSecret);

// Gaxios errors carry the HTTP response; socket failures only a code.
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const response: unknown = Reflect.get(error, "response");
  if (typeof response !== "object" || response === null) return undefined;
  const status: unknown = Reflect.get(response, "status");
  return typeof status === "number" ? status : undefined;
}

export function isNetworkFailure(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  const code: unknown = Reflect.get(error, "code");
  return (
    typeof code === "string" &&
    /^(ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|EPIPE)$/.test(code)
  );
}
