/**
 * AWS Client Configuration Helper
 *
 * Builds SDK client config from the environment. Static credentials are used
 * when present so the SDK does not walk its provider chain (which uses dynamic
 * imports that break under Jest); otherwise the default chain applies.
 */

export interface AWSClientConfig {
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
}

export function getAWSClientConfig(region?: string): AWSClientConfig {
  const config: AWSClientConfig = { region: region || process.env.AWS_REGION };

  const accessKeyId = process.env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = process.env.AWS_SECRET_ACCESS_KEY;
  if (accessKeyId && secretAccessKey) {
    config.credentials = {
      accessKeyId,
      secretAccessKey,
      ...(process.env.AWS_SESSION_TOKEN ? { sessionToken: process.env.AWS_SESSION_TOKEN } : {}),
    };
  }

  return config;
}
