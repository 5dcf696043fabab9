import type { PolicyConfig } from "@/lib/config";
import { MAX_LISTED_MISSING_REFERENCES } from "@/lib/constants";
import { ERROR_CODES } from "@/lib/error-codes";
import type { Claim, ScreeningError, ScrollType } from "@/lib/types";
import { uniqueSorted } from "@/lib/utils";

export interface ScreeningSubject {
  type: ScrollType;
  title: string;
  abstract: string;
  content: string;
  domain: string;
  authors: string[];
  references: string[];
  claims: Claim[];
}

/**
 * Runs every screening rule against a submission and returns all failures.
 * An empty list means the scroll may enter review. Pure; never throws.
 */
export function screenSubmission(
  subject: ScreeningSubject,
  policy: Pick<PolicyConfig, "minAbstractLength" | "minContentLength">,
  referenceExists: (scrollId: string) => boolean
): ScreeningError[] {
  const errors: ScreeningError[] = [];

  if (!subject.title.trim()) {
    errors.push({ rule: ERROR_CODES.titleRequired, message: "Title is required" });
  }

  const abstractLength = subject.abstract.trim().length;
  if (abstractLength < policy.minAbstractLength) {
    errors.push({
      rule: ERROR_CODES.abstractTooShort,
      message: `Abstract must be at least ${policy.minAbstractLength} characters (got ${abstractLength})`
    });
  }

  const contentLength = subject.content.trim().length;
  if (contentLength < policy.minContentLength) {
    errors.push({
      rule: ERROR_CODES.contentTooShort,
      message: `Content must be at least ${policy.minContentLength} characters (got ${contentLength})`
    });
  }

  if (subject.authors.length === 0) {
    errors.push({ rule: ERROR_CODES.authorsRequired, message: "At least one author is required" });
  }

  if (!subject.domain.trim()) {
    errors.push({ rule: ERROR_CODES.domainRequired, message: "Domain is required" });
  }

  if (subject.type === "hypothesis" && subject.claims.length === 0) {
    errors.push({ rule: ERROR_CODES.hypothesisNeedsClaims, message: "Hypothesis scrolls must state at least one claim" });
  }

  if (subject.type === "meta_analysis" && subject.references.length < 2) {
    errors.push({
      rule: ERROR_CODES.metaAnalysisNeedsReferences,
      message: `Meta-analysis scrolls must cite at least 2 scrolls (got ${subject.references.length})`
    });
  }

  if (subject.type === "rebuttal" && subject.references.length === 0) {
    errors.push({ rule: ERROR_CODES.rebuttalNeedsTarget, message: "Rebuttal scrolls must cite the scroll they rebut" });
  }

  const missing = uniqueSorted(subject.references.filter((ref) => !referenceExists(ref)));
  if (missing.length) {
    const listed = missing.slice(0, MAX_LISTED_MISSING_REFERENCES).join(", ");
    const suffix = missing.length > MAX_LISTED_MISSING_REFERENCES ? "..." : "";
    errors.push({ rule: ERROR_CODES.invalidReferences, message: `Unknown cited scroll IDs: ${listed}${suffix}` });
  }

  return errors;
}
