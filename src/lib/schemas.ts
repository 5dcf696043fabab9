import { z } from "zod";
import {
  CLAIM_KINDS,
  DEFAULT_REVIEW_CONFIDENCE,
  RECOMMENDATIONS,
  SANCTION_TYPES,
  SCORE_MAX,
  SCORE_MIN,
  SCROLL_TYPES
} from "@/lib/constants";

export const scrollTypeSchema = z.enum(SCROLL_TYPES);
export const recommendationSchema = z.enum(RECOMMENDATIONS);
export const sanctionTypeSchema = z.enum(SANCTION_TYPES);

export const claimSchema = z.object({
  kind: z.enum(CLAIM_KINDS),
  statement: z.string().min(1),
  evidence: z.string().optional()
});

export const methodProfileSchema = z.object({
  approach: z.string().min(1),
  datasets: z.array(z.string()).default([]),
  tools: z.array(z.string()).default([]),
  notes: z.string().optional()
});

export const suggestedEditSchema = z.object({
  section: z.string().min(1),
  originalText: z.string().default(""),
  proposedText: z.string().min(1),
  rationale: z.string().default("")
});

export const responseLetterItemSchema = z.object({
  reviewerId: z.string().min(1),
  reviewerComment: z.string().default(""),
  authorResponse: z.string().min(1),
  changeMade: z.string().default("")
});

const scoreSchema = z.number().int().min(SCORE_MIN).max(SCORE_MAX);

// Length and presence rules belong to screening, which reports them by rule name.
export const scrollSubmissionSchema = z.object({
  type: scrollTypeSchema,
  title: z.string().default(""),
  abstract: z.string().default(""),
  content: z.string().default(""),
  domain: z.string().default(""),
  authors: z.array(z.string().min(1)).default([]),
  keywords: z.array(z.string()).default([]),
  references: z.array(z.string().min(1)).default([]),
  claims: z.array(claimSchema).default([]),
  methodProfile: methodProfileSchema.nullable().default(null),
  resultSummary: z.string().nullable().default(null)
});

export const reviewSubmissionSchema = z.object({
  scores: z.object({
    originality: scoreSchema,
    methodology: scoreSchema,
    significance: scoreSchema,
    clarity: scoreSchema,
    overall: scoreSchema
  }),
  recommendation: recommendationSchema,
  commentsToAuthors: z.string().default(""),
  confidentialComments: z.string().default(""),
  suggestedEdits: z.array(suggestedEditSchema).default([]),
  confidence: z.number().min(0).max(1).default(DEFAULT_REVIEW_CONFIDENCE)
});

export const revisionPatchSchema = z
  .object({
    title: z.string().min(1).optional(),
    abstract: z.string().min(1).optional(),
    content: z.string().min(1).optional(),
    keywords: z.array(z.string()).optional(),
    references: z.array(z.string().min(1)).optional(),
    claims: z.array(claimSchema).optional(),
    methodProfile: methodProfileSchema.nullable().optional(),
    resultSummary: z.string().nullable().optional(),
    changeSummary: z.string().default(""),
    responseLetter: z.array(responseLetterItemSchema).default([])
  })
  .strict();

export const artifactBundleSubmissionSchema = z.object({
  codeHash: z.string().min(1),
  dataHash: z.string().min(1),
  environmentSpec: z.string().min(1),
  runCommands: z.array(z.string().min(1)).min(1),
  expectedMetrics: z.record(z.number()).default({}),
  randomSeed: z.number().int().nullable().default(null)
});

export const replicationSubmissionSchema = z
  .object({
    artifactBundleId: z.string().min(1),
    success: z.boolean(),
    observedMetrics: z.record(z.number()).default({}),
    logs: z.string().default(""),
    environmentUsed: z.string().default(""),
    startedAt: z.string().datetime(),
    completedAt: z.string().datetime()
  })
  .superRefine((value, ctx) => {
    if (new Date(value.completedAt).getTime() < new Date(value.startedAt).getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["completedAt"],
        message: "completedAt must not be earlier than startedAt"
      });
    }
  });

export const scholarRegistrationSchema = z.object({
  name: z.string().trim().min(1).max(200),
  affiliation: z.string().default(""),
  bio: z.string().default(""),
  domains: z.array(z.string().min(1)).default([])
});

export const sanctionRequestSchema = z.object({
  scholarId: z.string().min(1),
  type: sanctionTypeSchema,
  reason: z.string().min(1),
  scrollId: z.string().min(1).optional(),
  durationHours: z.number().positive().optional()
});

export type ScrollSubmissionInput = z.input<typeof scrollSubmissionSchema>;
export type ScrollSubmission = z.output<typeof scrollSubmissionSchema>;
export type ReviewSubmissionInput = z.input<typeof reviewSubmissionSchema>;
export type ReviewSubmission = z.output<typeof reviewSubmissionSchema>;
export type RevisionPatchInput = z.input<typeof revisionPatchSchema>;
export type RevisionPatch = z.output<typeof revisionPatchSchema>;
export type ArtifactBundleInput = z.input<typeof artifactBundleSubmissionSchema>;
export type ArtifactBundleSubmission = z.output<typeof artifactBundleSubmissionSchema>;
export type ReplicationInput = z.input<typeof replicationSubmissionSchema>;
export type ReplicationSubmission = z.output<typeof replicationSubmissionSchema>;
export type ScholarRegistrationInput = z.input<typeof scholarRegistrationSchema>;
export type ScholarRegistration = z.output<typeof scholarRegistrationSchema>;
export type SanctionRequestInput = z.input<typeof sanctionRequestSchema>;
export type SanctionRequest = z.output<typeof sanctionRequestSchema>;
