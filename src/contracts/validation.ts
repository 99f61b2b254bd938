/**
 * Boundary validation helpers.
 * Pure functions: no side effects, no I/O.
 */

import type { z } from "zod";
import { ValidationError } from "../errors.js";
import {
  GenerationRequestSchema,
  type AgentConfig,
  type CoverageLink,
  type GenerationRequest,
} from "./schemas.js";

/** Flatten zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse `input` with `schema`, throwing ValidationError on failure.
 *
 * @param label  Names the record in the error message (e.g. "assay report").
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid ${label}: ${issues.join("; ")}`, issues, {
      record: label,
    });
  }
  return result.data;
}

export function parseGenerationRequest(input: unknown): GenerationRequest {
  return parseWith(GenerationRequestSchema, input, "generation request");
}

/**
 * Expand an agent configuration into its coverage links.
 *
 * `coverageMap` entries come first (in key order), then explicit `links`.
 * Duplicates are kept here; the coverage mapper collapses them.
 */
export function coverageLinksFromConfig(config: AgentConfig): CoverageLink[] {
  const links: CoverageLink[] = [];
  for (const [requirementId, testIds] of Object.entries(config.coverageMap)) {
    for (const testId of testIds) {
      links.push({ requirementId, testId });
    }
  }
  links.push(...config.links);
  return links;
}
