export const CANDIDATE_EXTRACTION_PROMPT = `You extract structured candidate details from resume text.
If a detail is not present in the resume, use "N/A".
Respond ONLY with valid JSON following this schema:
{
  "name": "<candidate full name>",
  "graduation": "<degree, university, year>",
  "skills": ["<skill>", "..."],
  "certifications": ["<certification>", "..."]
}`;

export const SKILL_MATCH_PROMPT = `You check whether a candidate matches the requirements of a job description.
Compare the required skills and experience against the candidate's resume and extracted profile.
Set "match" to true only if the candidate meets the core requirements (the equivalent of answering "Match: Yes").
Respond ONLY with valid JSON following this schema:
{
  "match": <true or false>,
  "matched_skills": ["<required skill the candidate has>", "..."],
  "missing_skills": ["<required skill the candidate lacks>", "..."],
  "summary": "<two or three sentences on the fit>"
}`;

export const SCORING_PROMPT = `You score how well a candidate fits a job, using the job description, the candidate profile and the skill match.
Respond ONLY with valid JSON following this schema:
{
  "score": <integer between 1 and 100>,
  "rationale": "<short justification of the score>"
}`;

export const RECOMMENDATION_PROMPT = `You write the final hiring recommendation for a screened candidate.
Use the job description, candidate profile, skill match and fit score. If the reviewer's preferred roles are given, mention how the candidate relates to them.
Respond ONLY with valid JSON following this schema:
{
  "decision": "hire" | "reject",
  "summary": "<succinct recommendation for the hiring manager>",
  "improvements": ["<concrete suggestion for the candidate>", "..."]
}`;
