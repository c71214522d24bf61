import { z } from 'zod';

import type { ScreeningLlm } from '../llm/client';
import { SKILL_MATCH_PROMPT } from '../llm/prompts';
import { LlmError } from '../util/errors';
import type { CandidateProfile } from './extractCandidate';
import { cleanList } from './skills';

const skillMatchSchema = z.object({
  match: z.boolean(),
  matched_skills: z.union([z.array(z.string()), z.string()]).default([]),
  missing_skills: z.union([z.array(z.string()), z.string()]).default([]),
  summary: z.string(),
});

type MatchSkillsArgs = {
  jobDescription: string;
  resumeText: string;
  candidate: CandidateProfile;
};

export type SkillMatch = {
  match: boolean;
  matchedSkills: string[];
  missingSkills: string[];
  summary: string;
};

export const matchSkills = async (
  llm: ScreeningLlm,
  { jobDescription, resumeText, candidate }: MatchSkillsArgs,
): Promise<SkillMatch> => {
  const response = await llm.completeJson('matching', SKILL_MATCH_PROMPT, {
    jobDescription,
    resumeText,
    candidate: {
      name: candidate.name,
      graduation: candidate.graduation,
      skills: candidate.skills,
      certifications: candidate.certifications,
    },
  });

  const parsed = skillMatchSchema.safeParse(response);

  if (!parsed.success) {
    throw new LlmError('matching', 'response did not match the expected schema', { cause: parsed.error });
  }

  return {
    match: parsed.data.match,
    matchedSkills: cleanList(parsed.data.matched_skills),
    missingSkills: cleanList(parsed.data.missing_skills),
    summary: parsed.data.summary.trim(),
  };
};
