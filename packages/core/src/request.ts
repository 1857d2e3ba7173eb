/**
 * Check requests
 *
 * Requests arrive from callers as plain data. Each one is validated on its
 * own, so a malformed entry is rejected without failing the whole batch.
 */
import { z } from "zod";
import { ORDINAL_IDENTITY_PREFIX } from "./constants/defaults";

export const CheckRequestSchema = z.object({
  identity: z.string().min(1, "identity must not be empty").optional(),
  checkType: z.string().min(1, "checkType must not be empty"),
  config: z.record(z.unknown()).default({}),
});

export interface CheckRequest {
  readonly identity: string;
  readonly checkType: string;
  readonly config: Readonly<Record<string, unknown>>;
}

export type NormalizedRequest =
  | { readonly index: number; readonly valid: true; readonly request: CheckRequest }
  | {
      readonly index: number;
      readonly valid: false;
      readonly identity: string;
      readonly checkType: string;
      readonly issues: string[];
    };

/** Identity assigned to a request that did not carry one. */
export function ordinalIdentity(index: number): string {
  return `${ORDINAL_IDENTITY_PREFIX}${index + 1}`;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate and freeze a single request. Invalid requests keep whatever
 * identity/type could be salvaged so they can still be reported in place.
 */
export function normalizeRequest(raw: unknown, index: number): NormalizedRequest {
  const parsed = CheckRequestSchema.safeParse(raw);
  if (parsed.success) {
    return {
      index,
      valid: true,
      request: Object.freeze({
        identity: parsed.data.identity ?? ordinalIdentity(index),
        checkType: parsed.data.checkType,
        config: Object.freeze({ ...parsed.data.config }),
      }),
    };
  }

  const salvage = z
    .object({ identity: z.string().min(1).optional(), checkType: z.string().optional() })
    .safeParse(raw);

  return {
    index,
    valid: false,
    identity: (salvage.success ? salvage.data.identity : undefined) ?? ordinalIdentity(index),
    checkType: (salvage.success ? salvage.data.checkType : undefined) ?? "unknown",
    issues: formatIssues(parsed.error),
  };
}

export function normalizeRequests(raw: readonly unknown[]): NormalizedRequest[] {
  return raw.map((entry, index) => normalizeRequest(entry, index));
}
