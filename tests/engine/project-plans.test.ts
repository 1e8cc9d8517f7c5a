import { RankedCandidate } from '../../src/domain/candidate';
import { BranchStatus, MergedArtifact, MergedGapEntry } from '../../src/domain/run';
import { createLogger } from '../../src/logger';
import { buildCatalog, missingSkills, synthesizeProjectPlans } from '../../src/engine/project-plans';
import { ScriptedTasks, captureLogs, noSleep, resetLogHandler } from '../helpers/fakes';

const SIGNALS = {
  wilsonLowerBound: 0.5,
  shrunkRatio: 0.5,
  velocity: 1,
  recency: 1,
  durationFit: 1,
  preferenceBoost: 1,
  keywordBonus: 0,
};

function ranked(id: string, rank: number, extra: Partial<RankedCandidate> = {}): RankedCandidate {
  return { id, title: `Item ${id}`, score: 1 - rank / 10, rank, signals: SIGNALS, ...extra };
}

function entry(gapId: string, topic: string, results: RankedCandidate[], status = BranchStatus.Done): MergedGapEntry {
  return status === BranchStatus.Done
    ? { gapId, topic, status, results }
    : { gapId, topic, status: BranchStatus.Failed, results: [], error: 'search rejected' };
}

function artifactOf(gaps: MergedGapEntry[]): MergedArtifact {
  return { gaps, succeeded: 0, failed: 0, artifactHash: 'test-hash' };
}

const ENV = {
  retryPolicy: { maxAttempts: 1, baseMs: 0, maxDelayMs: 0 },
  retryHooks: { sleep: noSleep },
  log: createLogger(),
};

beforeEach(() => {
  captureLogs();
});

afterEach(() => {
  resetLogHandler();
});

describe('missingSkills', () => {
  it('keeps the first occurrence of each topic, at most eight', () => {
    const gaps = ['go', 'sql', 'go', 'aws', 'gcp', 'k8s', 'helm', 'rust', 'java', 'ruby'].map(
      (topic, i) => entry(`gap-${i}`, topic, []),
    );
    expect(missingSkills(artifactOf(gaps))).toEqual(['go', 'sql', 'aws', 'gcp', 'k8s', 'helm', 'rust', 'java']);
  });
});

describe('buildCatalog', () => {
  it('takes the top three results of each successful gap that found any', () => {
    const catalog = buildCatalog(artifactOf([
      entry('gap-a', 'kubernetes', [
        ranked('a1', 1, { url: 'https://learn.test/a1', personalizationTip: 'Mention the cluster.' }),
        ranked('a2', 2),
        ranked('a3', 3),
        ranked('a4', 4),
      ]),
      entry('gap-b', 'terraform', []),
      entry('gap-c', 'observability', [], BranchStatus.Failed),
      entry('gap-d', 'sql', [ranked('d1', 1)]),
    ]));

    expect(catalog).toEqual([
      {
        gapId: 'gap-a',
        skill: 'kubernetes',
        tutorials: [
          { id: 'a1', title: 'Item a1', url: 'https://learn.test/a1', personalizationTip: 'Mention the cluster.' },
          { id: 'a2', title: 'Item a2' },
          { id: 'a3', title: 'Item a3' },
        ],
      },
      { gapId: 'gap-d', skill: 'sql', tutorials: [{ id: 'd1', title: 'Item d1' }] },
    ]);
  });
});

describe('synthesizeProjectPlans', () => {
  const plan = {
    title: 'Warehouse on Kubernetes',
    skillsCombined: ['kubernetes', 'sql'],
    personalizationTip: 'Reuse your pipeline.',
    cvBlurb: 'Ran a warehouse on Kubernetes.',
  };

  it('returns the plans the task produced', async () => {
    const tasks = new ScriptedTasks({ generate_projects: () => ({ projects: [plan] }) });
    const artifact = artifactOf([entry('gap-a', 'kubernetes', [ranked('a1', 1)]), entry('gap-b', 'sql', [])]);

    const plans = await synthesizeProjectPlans(artifact, { sourceText: 'cv', targetSpecText: 'job' }, { ...ENV, tasks });

    expect(plans).toEqual([plan]);
    expect(tasks.calls[0].inputs).toEqual({
      missingSkills: ['kubernetes', 'sql'],
      catalog: [{ gapId: 'gap-a', skill: 'kubernetes', tutorials: [{ id: 'a1', title: 'Item a1' }] }],
      sourceText: 'cv',
      targetSpecText: 'job',
    });
  });

  it('rejects more than two plans as a schema violation and yields none', async () => {
    const tasks = new ScriptedTasks({ generate_projects: () => ({ projects: [plan, plan, plan] }) });
    const artifact = artifactOf([entry('gap-a', 'kubernetes', [ranked('a1', 1)])]);

    expect(await synthesizeProjectPlans(artifact, {}, { ...ENV, tasks })).toEqual([]);
    // first answer plus the corrective retry
    expect(tasks.callsFor('generate_projects')).toHaveLength(2);
  });

  it('does not call the task without skills', async () => {
    const tasks = new ScriptedTasks({});
    expect(await synthesizeProjectPlans(artifactOf([]), {}, { ...ENV, tasks })).toEqual([]);
    expect(tasks.calls).toEqual([]);
  });
});
