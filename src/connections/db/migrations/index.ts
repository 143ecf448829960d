import { MigrationInfo } from './types';

import * as migration001 from './20251120_000001_create_staff_table';
import * as migration002 from './20251120_000002_create_one_time_passcodes_table';
import * as migration003 from './20251120_000003_create_it_issues_table';

export const migrations: MigrationInfo[] = [
  { name: '20251120_000001_create_staff_table', migration: migration001.migration },
  { name: '20251120_000002_create_one_time_passcodes_table', migration: migration002.migration },
  { name: '20251120_000003_create_it_issues_table', migration: migration003.migration },
];
