import { UnsupportedClaimError } from "../../errors.js";
import { evaluateSourceDominance } from "../../provenance/dominance.js";
import type { ProvenanceRecord, ReviewFinding, ReviewVerdict } from "../../types.js";
import type { StageHandler } from "../types.js";

/**
 * Rubric findings block MEDIUM and HIGH tasks and are advisory for LOW ones.
 * Unsupported claims block every tier.
 */
export const reviewStage: StageHandler = async (ctx) => {
  const output = ctx.task.workspace.output;
  const spec = ctx.task.workspace.spec;
  const rubricBlocks = ctx.task.riskTier !== "LOW";
  const findings: ReviewFinding[] = [];

  if (!output || !output.content.trim()) {
    findings.push({ code: "EMPTY_OUTPUT", message: "output is empty", blocking: rubricBlocks });
  }
  if (!spec || spec.deliverables.length === 0) {
    findings.push({
      code: "MISSING_DELIVERABLES",
      message: "spec lists no deliverables",
      blocking: rubricBlocks,
    });
  }

  const unsupportedClaims: string[] = [];
  const backing = new Map<string, ProvenanceRecord>();
  for (const claim of output?.claims ?? []) {
    if (!claim.text.trim()) {
      continue;
    }
    let supported = false;
    for (const ref of claim.provenanceRefs) {
      const resolved = await ctx.ledger.resolve(ref);
      for (const record of resolved) {
        backing.set(record.id, record);
      }
      supported ||= resolved.length > 0;
    }
    if (!supported) {
      unsupportedClaims.push(claim.text);
    }
  }
  let unsupportedError: UnsupportedClaimError | undefined;
  if (unsupportedClaims.length > 0) {
    unsupportedError = new UnsupportedClaimError(unsupportedClaims);
    findings.push({ code: "UNSUPPORTED_CLAIM", message: unsupportedError.message, blocking: true });
  }

  const dominance = evaluateSourceDominance({
    records: [...backing.values()],
    threshold: ctx.config.dominanceThreshold,
  });
  const warnings = dominance.dominant ? [`SourceDominanceWarning: ${dominance.reason}`] : [];

  const blocking = findings.filter((finding) => finding.blocking);
  const advisory = findings.filter((finding) => !finding.blocking);
  const review: ReviewVerdict = {
    passed: blocking.length === 0,
    findings,
    requiredChanges: blocking.map((finding) =>
      finding.code === "UNSUPPORTED_CLAIM"
        ? `cite a ledger record for: ${unsupportedClaims.join(" | ")}`
        : finding.message,
    ),
    unsupportedClaims,
    dominance: {
      dominant: dominance.dominant,
      ...(dominance.source ? { source: dominance.source } : {}),
      share: dominance.share,
      recordCount: dominance.recordCount,
    },
    warnings,
  };

  const policyRefs = ["inv-claims-supported"];
  if (dominance.dominant) {
    policyRefs.push("heur-source-dominance");
  }
  return {
    patch: { review },
    decision: review.passed ? "PASS" : "FAIL",
    rationale: review.passed
      ? advisory.length > 0
        ? `passed with advisory findings: ${advisory.map((finding) => finding.message).join("; ")}`
        : "all claims resolve to provenance records"
      : blocking.map((finding) => finding.message).join("; "),
    policyRefs,
    toolCalls: 0,
    evidence: {
      ...(unsupportedError ? { error: unsupportedError.name, unsupportedClaims } : {}),
      backingRecords: dominance.recordCount,
      dominanceShare: dominance.share,
      ...(warnings.length > 0 ? { warnings } : {}),
    },
    notes: [
      ...warnings,
      ...advisory.map((finding) => `post-hoc review: ${finding.message}`),
    ],
  };
};
