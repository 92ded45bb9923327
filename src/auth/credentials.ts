import { OAuth2Client } from "google-auth-library";

export const ADMOB_REPORT_SCOPE = "https://www.googleapis.com/auth/admob.report";

export interface CredentialProvider {
  getAccessToken(): Promise<string>;
}

export type RefreshTokenCredentials = {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
};

/** Exchanges a stored refresh token for access tokens; the client caches until expiry. */
export function createRefreshTokenProvider(creds: RefreshTokenCredentials): CredentialProvider {
  const client = new OAuth2Client({
    clientId: creds.clientId,
    clientSecret: creds.clientSecret,
  });
  client.setCredentials({ refresh_token: creds.refreshToken, scope: ADMOB_REPORT_SCOPE });

  return {
    async getAccessToken() {
      const { token } = await client.getAccessToken();
      if (!token) {
        throw new Error("OAuth token refresh returned no access token");
      }
      return token;
    },
  };
}
