import { fromIni } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { ICredentialResolver } from '../../core/interfaces/ICredentialResolver.js';

/**
 * Resolves credentials for a named profile from the shared AWS config and
 * credentials files (~/.aws/config, ~/.aws/credentials).
 */
export class ProfileCredentialResolver implements ICredentialResolver {
  async resolve(profileName: string): Promise<AwsCredentialIdentity> {
    const provider = fromIni({ profile: profileName });
    return provider();
  }
}
