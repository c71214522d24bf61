import { z } from 'zod';

import type { ScreeningLlm } from '../llm/client';
import { RECOMMENDATION_PROMPT } from '../llm/prompts';
import { LlmError } from '../util/errors';
import type { CandidateProfile } from './extractCandidate';
import type { SkillMatch } from './matchSkills';
import type { CandidateScore } from './scoreCandidate';
import { cleanList } from './skills';

const recommendationSchema = z.object({
  decision: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['hire', 'reject'])),
  summary: z.string(),
  improvements: z.union([z.array(z.string()), z.string()]).default([]),
});

// Suggestions are sentences, so a string reply is split by line only.
const toImprovements = (value: string[] | string): string[] =>
  cleanList(typeof value === 'string' ? value.split('\n').map((line) => line.replace(/^\s*[-*•]\s*/, '')) : value);

export type Decision = 'hire' | 'reject';

export type ReviewerPreferences = {
  name: string;
  preferredRoles: string;
};

type RecommendArgs = {
  jobDescription: string;
  candidate: CandidateProfile;
  skillMatch: SkillMatch;
  score: CandidateScore;
  preferences?: ReviewerPreferences;
};

export type Recommendation = {
  decision: Decision;
  summary: string;
  improvements: string[];
};

export const recommend = async (
  llm: ScreeningLlm,
  { jobDescription, candidate, skillMatch, score, preferences }: RecommendArgs,
): Promise<Recommendation> => {
  const response = await llm.completeJson('recommendation', RECOMMENDATION_PROMPT, {
    jobDescription,
    candidate: {
      name: candidate.name,
      graduation: candidate.graduation,
      skills: candidate.skills,
      certifications: candidate.certifications,
    },
    skillMatch,
    score: score.score,
    scoreRationale: score.rationale,
    ...(preferences && {
      reviewerName: preferences.name,
      reviewerPreferredRoles: preferences.preferredRoles,
    }),
  });

  const parsed = recommendationSchema.safeParse(response);

  if (!parsed.success) {
    throw new LlmError('recommendation', 'response did not match the expected schema', { cause: parsed.error });
  }

  return {
    decision: parsed.data.decision,
    summary: parsed.data.summary.trim(),
    improvements: toImprovements(parsed.data.improvements),
  };
};
