/**
 * Coinbase credential adjustments applied before building the client.
 */

export interface CoinbaseCredentials {
  apiKey?: string;
  secret?: string;
  password?: string;
  uid?: string;
  /** OAuth access token, takes precedence over the key pair */
  authToken?: string;
}

export interface AdaptedCredentials {
  apiKey?: string;
  secret?: string;
  password?: string;
  uid?: string;
  token: string | null;
  /** Authorization scheme prefix when authenticating with a token */
  authPrefix: string | null;
}

/** Placeholders sent when a token is used so that key/secret signing never applies. */
export const TOKEN_AUTH_PLACEHOLDER_KEY = "ANY_KEY";
export const TOKEN_AUTH_PLACEHOLDER_SECRET = "ANY_SECRET";

/**
 * Select bearer authentication when a token is provided, otherwise repair
 * PEM secrets pasted from the Coinbase UI with literal `\n` sequences.
 */
export const adaptCredentials = (credentials: CoinbaseCredentials): AdaptedCredentials => {
  const { apiKey, secret, password, uid, authToken } = credentials;
  if (authToken) {
    return {
      apiKey: TOKEN_AUTH_PLACEHOLDER_KEY,
      secret: TOKEN_AUTH_PLACEHOLDER_SECRET,
      password,
      uid,
      token: authToken,
      authPrefix: "Bearer ",
    };
  }
  return {
    apiKey,
    secret: secret?.includes("\\n") ? secret.replaceAll("\\n", "\n") : secret,
    password,
    uid,
    token: null,
    authPrefix: null,
  };
};
