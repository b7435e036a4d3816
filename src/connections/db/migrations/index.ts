import type { MigrationInfo } from './types';

import * as migration001 from './20261019_000001_create_produtos_table';
import * as migration002 from './20261019_000002_create_historico_table';

export const migrations: MigrationInfo[] = [
  { name: '20261019_000001_create_produtos_table', migration: migration001.migration },
  { name: '20261019_000002_create_historico_table', migration: migration002.migration },
];

export type { Migration, MigrationInfo } from './types';
