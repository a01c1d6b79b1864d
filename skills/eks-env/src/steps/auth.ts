import { getCallerIdentity } from "../tools/aws.js";
import type { Blocker } from "../tools/errors.js";

export type AuthResult =
  | { ok: true; accountId: string; arn: string; userId: string }
  | {
      ok: false;
      blockers: Blocker[];
      remediation: Array<{ message: string }>;
    };

/**
 * Validates AWS authentication and returns identity or blockers.
 * Nothing touches the account until this passes.
 */
export async function validateAwsAuth(
  awsProfile: string,
  awsRegion: string
): Promise<AuthResult> {
  const ident = await getCallerIdentity(awsProfile, awsRegion);
  const profileLabel = awsProfile || "default credential chain";
  const profileFlag = awsProfile ? ` --profile ${awsProfile}` : "";

  if (!ident.ok) {
    return {
      ok: false,
      blockers: [
        {
          code: "AWS_NOT_AUTHENTICATED",
          message: `AWS CLI is not authenticated (${profileLabel}) in region "${awsRegion}": ${ident.error}`,
        },
      ],
      remediation: [
        { message: `  - If using SSO: run 'aws sso login${profileFlag}'` },
        { message: `  - If using access keys: run 'aws configure${profileFlag}'` },
        { message: "  - Verify your AWS credentials are valid and have not expired" },
      ],
    };
  }

  return {
    ok: true,
    accountId: ident.accountId,
    arn: ident.arn,
    userId: ident.userId,
  };
}
