/**
 * @module @pagesmith/deploy-core/artifact/documents
 * LICENSE and README generated for every provisioned repository
 */

import { loadTemplate, renderTemplate } from './templates.js';

export const LICENSE_FILE = 'LICENSE';
export const README_FILE = 'README.md';

export function renderLicense(holder: string, now: Date): string {
  return renderTemplate(loadTemplate('LICENSE-MIT.txt'), {
    year: String(now.getUTCFullYear()),
    holder,
  });
}

export interface ReadmeInput {
  repoName: string;
  brief: string;
  pagesUrl: string;
  cloneUrl: string;
  files: readonly string[];
  generatedAt: Date;
}

function formatUtc(date: Date): string {
  // 2024-05-01 12:30:00 UTC
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function renderReadme(input: ReadmeInput): string {
  const fileLines = [...input.files]
    .sort()
    .map((file) => `- \`${file}\`: Application file`)
    .join('\n');

  return [
    `# ${input.repoName}`,
    '',
    '## Summary',
    'LLM-generated web application.',
    '',
    `**Brief:** ${input.brief}`,
    '',
    `**Live Demo:** ${input.pagesUrl}`,
    '',
    '## Setup',
    'This is a static web app. To run it locally:',
    '',
    '```bash',
    `git clone ${input.cloneUrl}`,
    `cd ${input.repoName}`,
    '',
    '# open index.html in a browser, or serve the directory',
    'npx serve .',
    '```',
    '',
    '## Files',
    fileLines,
    '',
    '## Usage',
    'Open `index.html` in your web browser.',
    '',
    '## License',
    'MIT License - see the LICENSE file for details.',
    '',
    '## Generated',
    `Generated on ${formatUtc(input.generatedAt)}.`,
    '',
  ].join('\n');
}
