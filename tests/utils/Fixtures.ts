/**
 * 📂 溶出曲線測試數據
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export interface ProfilePair {
  timePoints: number[];
  reference: number[][];
  test: number[][];
}

export interface DissolutionFixtures {
  fourPoint: ProfilePair;
  sevenPoint: ProfilePair;
}

export function loadDissolutionProfiles(): DissolutionFixtures {
  const dataPath = join(process.cwd(), 'tests', 'fixtures', 'dissolution_profiles.json');
  const parsed: DissolutionFixtures = JSON.parse(readFileSync(dataPath, 'utf-8'));
  return parsed;
}
