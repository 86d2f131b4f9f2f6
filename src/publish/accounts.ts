import { z } from "zod";
import { sanitizeErrorText } from "../generation/http.js";
import { UploadError, errorMessage } from "../pipeline/errors.js";
import { fileExists, readJsonFile, writeJson } from "../utils/fs.js";
import { logStep } from "../utils/logger.js";
import { createOAuthClient, httpStatusOf, type OAuthClientFactory } from "./google.js";
import type { AccessCredentials, CredentialProvider } from "./types.js";

// Refresh slightly early so the token survives a long upload start.
const EXPIRY_MARGIN_MS = 60_000;

const accountSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  /** ISO-8601 timestamp. */
  expiresAt: z.string().optional(),
});

const accountsFileSchema = z.object({
  accounts: z.record(accountSchema).default({}),
});

export type StoredAccount = z.infer<typeof accountSchema>;
export type AccountsFile = z.infer<typeof accountsFileSchema>;

export type FileCredentialProviderOptions = {
  path: string;
  clientId?: string;
  clientSecret?: string;
  now?: () => number;
  createOAuthClient?: OAuthClientFactory;
};

export function isExpired(account: StoredAccount, now: number): boolean {
  if (!account.expiresAt) return false;
  const expiresAt = Date.parse(account.expiresAt);
  return Number.isNaN(expiresAt) || expiresAt - EXPIRY_MARGIN_MS <= now;
}

/** Access tokens kept in a JSON accounts file, refreshed through OAuth when expired. */
export class FileCredentialProvider implements CredentialProvider {
  private readonly now: () => number;
  private readonly createOAuthClient: OAuthClientFactory;

  constructor(private options: FileCredentialProviderOptions) {
    this.now = options.now ?? Date.now;
    this.createOAuthClient = options.createOAuthClient ?? createOAuthClient;
  }

  async readAccounts(): Promise<AccountsFile> {
    if (!(await fileExists(this.options.path))) return { accounts: {} };
    const parsed = accountsFileSchema.safeParse(await readJsonFile(this.options.path));
    if (!parsed.success) {
      throw new UploadError(`Invalid accounts file: ${this.options.path}`);
    }
    return parsed.data;
  }

  async listAccounts(): Promise<string[]> {
    return Object.keys((await this.readAccounts()).accounts);
  }

  private async refresh(name: string, account: StoredAccount): Promise<StoredAccount> {
    const { clientId, clientSecret } = this.options;
    if (!account.refreshToken) {
      throw new UploadError(`Credentials for account "${name}" expired and have no refresh token`);
    }
    if (!clientId || !clientSecret) {
      throw new UploadError(
        `Credentials for account "${name}" expired; set OAUTH_CLIENT_ID and OAUTH_CLIENT_SECRET to refresh them`
      );
    }

    const client = this.createOAuthClient(clientId, clientSecret);
    client.setCredentials({ refresh_token: account.refreshToken });
    let token: string | null | undefined;
    try {
      ({ token } = await client.getAccessToken());
    } catch (error) {
      const status = httpStatusOf(error);
      throw new UploadError(
        `Token refresh for account "${name}" failed${status === undefined ? "" : ` with ${status}`}: ${sanitizeErrorText(errorMessage(error))}`,
        status
      );
    }
    if (!token) {
      throw new UploadError(`Token refresh for account "${name}" returned no access token`);
    }
    const { refresh_token: refreshToken, expiry_date: expiryDate } = client.credentials;
    return {
      accessToken: token,
      refreshToken: refreshToken || account.refreshToken,
      expiresAt: new Date(expiryDate ?? this.now() + 3600 * 1000).toISOString(),
    };
  }

  async getCredentials(name: string): Promise<AccessCredentials | undefined> {
    const file = await this.readAccounts();
    const account = file.accounts[name];
    if (!account) return undefined;
    if (!isExpired(account, this.now())) return { accessToken: account.accessToken };

    logStep("publish", `Refreshing credentials for account ${name}`);
    const refreshed = await this.refresh(name, account);
    await writeJson(this.options.path, {
      ...file,
      accounts: { ...file.accounts, [name]: refreshed },
    });
    return { accessToken: refreshed.accessToken };
  }
}
