import path from 'node:path';
import fs from 'fs-extra';
import type { DocSyncConfigInput } from '@docsync/core';

export const MANIFEST_URL = 'https://docs.test/llms.txt';

export const ROUTES: Record<string, string> = {
  [MANIFEST_URL]: [
    '- [Getting Started](https://docs.test/start.md)',
    '- [API: Reference?](https://docs.test/api.md)',
  ].join('\n'),
  'https://docs.test/start.md': '# Start',
  'https://docs.test/api.md': '# API',
};

export const CONFIG: DocSyncConfigInput = {
  assistants: {
    docs: {
      id: 'asst_1',
      title: 'Product docs',
      icon: '📚',
      description: 'Answers product questions',
      manifestUrl: MANIFEST_URL,
    },
    support: {
      id: 'asst_2',
      title: 'Support',
    },
  },
  sync: { scratchRoot: 'scratch', pollIntervalMs: 0 },
};

export async function writeConfig(dir: string, config: DocSyncConfigInput = CONFIG): Promise<string> {
  const file = path.join(dir, 'docsync.config.json');
  await fs.writeJson(file, config);
  return file;
}
