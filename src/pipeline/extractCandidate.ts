import { z } from 'zod';

import type { ScreeningLlm } from '../llm/client';
import { CANDIDATE_EXTRACTION_PROMPT } from '../llm/prompts';
import { LlmError } from '../util/errors';
import { cleanList } from './skills';

// Each field is read on its own so one bad value does not discard the rest.
const textField = z.string().nullish().catch(undefined);
const listField = z.union([z.array(z.unknown()), z.string()]).nullish().catch(undefined);

const candidateSchema = z.object({
  name: textField,
  graduation: textField,
  skills: listField,
  certifications: listField,
});

export type CandidateProfile = {
  name: string;
  graduation: string;
  skills: string[];
  certifications: string[];
  rawResponse?: string;
};

const orNotAvailable = (value: string | null | undefined): string => value?.trim() || 'N/A';

export const emptyCandidate = (rawResponse?: string): CandidateProfile => ({
  name: 'N/A',
  graduation: 'N/A',
  skills: [],
  certifications: [],
  ...(rawResponse !== undefined && { rawResponse }),
});

type ExtractionReply =
  | { kind: 'json'; value: unknown }
  | { kind: 'unparsed'; text: string };

const requestExtraction = async (llm: ScreeningLlm, resumeText: string): Promise<ExtractionReply> => {
  try {
    const value = await llm.completeJson('extraction', CANDIDATE_EXTRACTION_PROMPT, { resumeText });
    return { kind: 'json', value };
  } catch (error) {
    // The model answered, just not in JSON: keep going with an N/A profile.
    if (error instanceof LlmError && error.step === 'extraction' && error.rawResponse !== undefined) {
      return { kind: 'unparsed', text: error.rawResponse };
    }
    throw error;
  }
};

export const extractCandidate = async (llm: ScreeningLlm, resumeText: string): Promise<CandidateProfile> => {
  const reply = await requestExtraction(llm, resumeText);

  if (reply.kind === 'unparsed') {
    return emptyCandidate(reply.text);
  }

  const response = reply.value;
  const parsed = candidateSchema.safeParse(response);

  if (!parsed.success) {
    return emptyCandidate(JSON.stringify(response));
  }

  const { name, graduation, skills, certifications } = parsed.data;

  if ([name, graduation, skills, certifications].every((value) => value === undefined || value === null)) {
    return emptyCandidate(JSON.stringify(response));
  }

  return {
    name: orNotAvailable(name),
    graduation: orNotAvailable(graduation),
    skills: cleanList(skills),
    certifications: cleanList(certifications),
  };
};
