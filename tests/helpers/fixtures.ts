import { readFile } from 'node:fs/promises';

const fixturesRoot = new URL('../../fixtures/eventor/', import.meta.url);

export const readFixture = (relativePath: string): Promise<string> =>
  readFile(new URL(relativePath, fixturesRoot), 'utf-8');
