import type { ScreeningReport } from './screen';

const joinOrNone = (values: string[]): string => (values.length ? values.join(', ') : 'none');

export const formatReport = (report: ScreeningReport): string => {
  const { candidate, skillMatch, score, recommendation } = report;
  const lines: string[] = [];

  if (skillMatch.match) {
    lines.push(
      'Match: Yes',
      `Candidate: ${candidate.name}`,
      `Graduation: ${candidate.graduation}`,
      `Skills: ${joinOrNone(candidate.skills)}`,
      `Certifications: ${joinOrNone(candidate.certifications)}`,
      `Matched skills: ${joinOrNone(skillMatch.matchedSkills)}`,
      `Missing skills: ${joinOrNone(skillMatch.missingSkills)}`,
    );
  } else {
    lines.push('Match: No', 'You are not matched');
  }

  lines.push(
    `Candidate Fit Score: ${score.score}/100`,
    `Recommendation: ${recommendation.decision.toUpperCase()}`,
    recommendation.summary,
  );

  if (recommendation.improvements.length) {
    lines.push('Suggested improvements:', ...recommendation.improvements.map((item) => `- ${item}`));
  }

  return lines.join('\n');
};
