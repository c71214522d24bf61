import type { Logger } from '../config/logger';
import type { ScreeningLlm } from '../llm/client';
import type { ScreeningStep } from '../util/errors';
import { extractCandidate, type CandidateProfile } from './extractCandidate';
import { matchSkills, type SkillMatch } from './matchSkills';
import { recommend, type Recommendation, type ReviewerPreferences } from './recommend';
import { scoreCandidate, type CandidateScore } from './scoreCandidate';

export type ScreeningDeps = {
  llm: ScreeningLlm;
  logger: Logger;
  now?: () => Date;
};

export type ScreenResumeArgs = {
  resumeText: string;
  jobDescription: string;
  preferences?: ReviewerPreferences;
};

export type StepDurations = Record<ScreeningStep, number>;

export type ScreeningReport = {
  candidate: CandidateProfile;
  skillMatch: SkillMatch;
  score: CandidateScore;
  recommendation: Recommendation;
  durationsMs: StepDurations;
  completedAt: string;
};

/**
 * Runs the four screening steps one after another. Each step sees the output of
 * the ones before it; an error in any step ends the run before the next starts.
 */
export const screenResume = async (
  { llm, logger, now = () => new Date() }: ScreeningDeps,
  { resumeText, jobDescription, preferences }: ScreenResumeArgs,
): Promise<ScreeningReport> => {
  const durationsMs: StepDurations = {
    extraction: 0,
    matching: 0,
    scoring: 0,
    recommendation: 0,
  };

  const timed = async <T>(step: ScreeningStep, run: () => Promise<T>): Promise<T> => {
    const startedAt = Date.now();
    logger.debug('screening.step.started', { step });
    const value = await run();
    durationsMs[step] = Date.now() - startedAt;
    logger.info('screening.step.completed', { step, durationMs: durationsMs[step] });
    return value;
  };

  const candidate = await timed('extraction', () => extractCandidate(llm, resumeText));

  if (candidate.rawResponse !== undefined) {
    logger.warn('screening.extraction.fallback', { rawResponse: candidate.rawResponse });
  }

  const skillMatch = await timed('matching', () =>
    matchSkills(llm, { jobDescription, resumeText, candidate }));

  const score = await timed('scoring', () =>
    scoreCandidate(llm, { jobDescription, candidate, skillMatch }));

  const recommendation = await timed('recommendation', () =>
    recommend(llm, { jobDescription, candidate, skillMatch, score, preferences }));

  return {
    candidate,
    skillMatch,
    score,
    recommendation,
    durationsMs,
    completedAt: now().toISOString(),
  };
};
