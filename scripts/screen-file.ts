import fs from 'node:fs';

import { loadConfig } from '../src/config/env';
import { createLogger } from '../src/config/logger';
import { OpenAiScreeningLlm } from '../src/llm/client';
import { extractText, normalizeText } from '../src/pipeline/extractText';
import { formatReport } from '../src/pipeline/report';
import { screenResume } from '../src/pipeline/screen';

const USAGE = 'Usage: npm run screen -- <resume.pdf|.txt|.md> <job-description.pdf|.txt|.md | ->';

const readJobDescription = async (source: string): Promise<string> => {
  if (source !== '-') {
    return (await extractText(source)).text;
  }

  const text = normalizeText(fs.readFileSync(0, 'utf-8'));
  if (!text) {
    throw new Error('Job description read from stdin is empty.');
  }
  return text;
};

const main = async (): Promise<void> => {
  const [resumePath, jobSource] = process.argv.slice(2);

  if (!resumePath || !jobSource) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, write: (line) => process.stderr.write(line) });
  const llm = new OpenAiScreeningLlm(config.llm, logger);

  const resume = await extractText(resumePath);
  logger.info('Resume text extracted.', { pages: resume.pages, format: resume.format });

  const jobDescription = await readJobDescription(jobSource);
  const report = await screenResume({ llm, logger }, { resumeText: resume.text, jobDescription });

  console.log(formatReport(report));
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
