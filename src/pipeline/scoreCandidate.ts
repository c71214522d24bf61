import { z } from 'zod';

import type { ScreeningLlm } from '../llm/client';
import { SCORING_PROMPT } from '../llm/prompts';
import { LlmError } from '../util/errors';
import type { CandidateProfile } from './extractCandidate';
import type { SkillMatch } from './matchSkills';

export const MIN_SCORE = 1;
export const MAX_SCORE = 100;

const scoreSchema = z.object({
  score: z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]),
  rationale: z.string().default(''),
});

type ScoreCandidateArgs = {
  jobDescription: string;
  candidate: CandidateProfile;
  skillMatch: SkillMatch;
};

export type CandidateScore = {
  score: number;
  rationale: string;
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const normalizeScore = (value: number): number =>
  Number.isFinite(value) ? clamp(Math.round(value), MIN_SCORE, MAX_SCORE) : MIN_SCORE;

export const scoreCandidate = async (
  llm: ScreeningLlm,
  { jobDescription, candidate, skillMatch }: ScoreCandidateArgs,
): Promise<CandidateScore> => {
  const response = await llm.completeJson('scoring', SCORING_PROMPT, {
    jobDescription,
    candidate: {
      name: candidate.name,
      graduation: candidate.graduation,
      skills: candidate.skills,
      certifications: candidate.certifications,
    },
    skillMatch,
  });

  const parsed = scoreSchema.safeParse(response);

  if (!parsed.success) {
    throw new LlmError('scoring', 'response did not match the expected schema', { cause: parsed.error });
  }

  return {
    score: normalizeScore(parsed.data.score),
    rationale: parsed.data.rationale.trim(),
  };
};
