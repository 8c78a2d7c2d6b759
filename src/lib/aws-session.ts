import { fromIni } from '@aws-sdk/credential-providers';

export type CredentialsProvider = ReturnType<typeof fromIni>;

/**
 * Explicit AWS session handed to every AWS-facing class at construction,
 * instead of reading ambient process state.
 */
export interface AwsSession {
  region: string;
  credentials?: CredentialsProvider;
}

export function createAwsSession(options: { region: string; profile?: string }): AwsSession {
  return {
    region: options.region,
    credentials: options.profile ? fromIni({ profile: options.profile }) : undefined
  };
}

/**
 * Client configuration for an SDK client, optionally pinned to another region
 * (CloudFront, Route 53 and ACM certificates for CloudFront live in us-east-1).
 */
export function clientConfig(session: AwsSession, region?: string): { region: string; credentials?: CredentialsProvider } {
  return {
    region: region ?? session.region,
    credentials: session.credentials
  };
}
