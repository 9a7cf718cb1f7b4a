/**
 * Coarse effort estimate for a merged pull request, from its size alone
 */

export type EffortBucket = 'XS' | 'S' | 'M' | 'L' | 'XL';

export interface PRSize {
  additions: number;
  deletions: number;
  changedFiles: number;
}

export interface EffortEstimate {
  bucket: EffortBucket;
  storyPoints: number;
  /** jira-cli --original-estimate value */
  originalEstimate: string;
  linesChanged: number;
  filesChanged: number;
}

const BUCKETS: EffortBucket[] = ['XS', 'S', 'M', 'L', 'XL'];

// Upper bounds (inclusive) for XS..L; anything larger is XL
const LINE_LIMITS = [10, 50, 250, 1000];
const FILE_LIMITS = [1, 3, 10, 25];

const STORY_POINTS: Record<EffortBucket, number> = { XS: 1, S: 2, M: 3, L: 5, XL: 8 };
const ORIGINAL_ESTIMATE: Record<EffortBucket, string> = {
  XS: '1h',
  S: '2h',
  M: '4h',
  L: '1d',
  XL: '2d',
};

function bucketIndex(value: number, limits: number[]): number {
  const index = limits.findIndex((limit) => value <= limit);
  return index === -1 ? limits.length : index;
}

export function estimateEffort(size: PRSize): EffortEstimate {
  const linesChanged = Math.max(0, size.additions) + Math.max(0, size.deletions);
  const filesChanged = Math.max(0, size.changedFiles);

  const bucket =
    BUCKETS[Math.max(bucketIndex(linesChanged, LINE_LIMITS), bucketIndex(filesChanged, FILE_LIMITS))];

  return {
    bucket,
    storyPoints: STORY_POINTS[bucket],
    originalEstimate: ORIGINAL_ESTIMATE[bucket],
    linesChanged,
    filesChanged,
  };
}
