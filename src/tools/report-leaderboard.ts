import { bestRun, latestRun, parseAccuracy } from "../ledger/lookup.js";
import { countRuns, serializeTrainingHistory } from "../ledger/read-ledger.js";
import type { TrainingHistory } from "../ledger/types.js";
import { sha256CanonicalHex } from "../utils/hash.js";

export type LeaderboardSort = "accuracy" | "model";

export type LeaderboardOptions = {
  top?: number;
  sortBy?: LeaderboardSort;
  accuracyDigits?: number;
  source?: string;
};

export type LeaderboardRow = {
  rank: number;
  model: string;
  runs: number;
  latest_version: string;
  best_version: string;
  accuracy: number | null;
  accuracy_text: string;
  epochs_trained: number;
  accelerators: number;
  contributor: string;
  script: string;
  tensorboard_logs: string;
};

export type LeaderboardModel = {
  source?: string;
  ledger_sha256: string;
  totals: {
    models: number;
    runs: number;
    contributors: number;
  };
  rows: LeaderboardRow[];
};

export type ContributorStats = {
  contributor: string;
  runs: number;
  models: string[];
  scripts_authored: string[];
};

export const formatPercent = (value: number | null, digits = 2): string =>
  value === null ? "n/a" : `${(value * 100).toFixed(digits)}%`;

const SHORT_HASH_LENGTH = 7;

const compareRows = (sortBy: LeaderboardSort) => (a: LeaderboardRow, b: LeaderboardRow): number => {
  const byName = a.model < b.model ? -1 : a.model > b.model ? 1 : 0;
  if (sortBy === "model") {
    return byName;
  }
  const left = a.accuracy ?? -1;
  const right = b.accuracy ?? -1;
  return left === right ? byName : right - left;
};

export const buildLeaderboard = (
  history: TrainingHistory,
  options: LeaderboardOptions = {}
): LeaderboardModel => {
  const digits = options.accuracyDigits ?? 2;
  const rows: LeaderboardRow[] = [];

  for (const [model, runs] of history.models) {
    const latest = latestRun(runs);
    if (!latest) {
      continue;
    }
    const best = bestRun(history, model);
    const run = best ? { version: best.version, record: best.record } : latest;
    const accuracy = parseAccuracy(run.record.validation_accuracy);
    rows.push({
      rank: 0,
      model,
      runs: runs.length,
      latest_version: latest.version,
      best_version: run.version,
      accuracy,
      accuracy_text: formatPercent(accuracy, digits),
      epochs_trained: run.record.epochs_trained,
      accelerators: run.record.accelerators,
      contributor: run.record.contributor,
      script: `${run.record.script.name}@${run.record.script.version.slice(0, SHORT_HASH_LENGTH)}`,
      tensorboard_logs: run.record.tensorboard_logs
    });
  }

  const ranked = rows
    .sort(compareRows(options.sortBy ?? "accuracy"))
    .map((row, index) => ({ ...row, rank: index + 1 }));

  const contributors = new Set<string>();
  for (const runs of history.models.values()) {
    runs.forEach((run) => contributors.add(run.record.contributor));
  }

  return {
    source: options.source,
    ledger_sha256: sha256CanonicalHex(serializeTrainingHistory(history)),
    totals: {
      models: history.models.size,
      runs: countRuns(history),
      contributors: contributors.size
    },
    rows: options.top !== undefined ? ranked.slice(0, options.top) : ranked
  };
};

export const formatLeaderboardText = (model: LeaderboardModel): string => {
  const lines: string[] = [];
  lines.push("Training Leaderboard");
  if (model.source) {
    lines.push(`Ledger: ${model.source}`);
  }
  lines.push(
    `Models: ${model.totals.models} | Runs: ${model.totals.runs} | Contributors: ${model.totals.contributors}`
  );

  if (model.rows.length === 0) {
    lines.push("No runs recorded.");
  }
  for (const row of model.rows) {
    const latest = row.latest_version !== row.best_version ? ` [latest ${row.latest_version}]` : "";
    lines.push(
      `${row.rank}. ${row.model} ${row.best_version} ${row.accuracy_text} (epochs ${row.epochs_trained}, accelerators ${row.accelerators}, by ${row.contributor})${latest}`
    );
  }

  lines.push(`Ledger sha256: ${model.ledger_sha256}`);
  return `${lines.join("\n")}\n`;
};

const escapeCell = (value: string): string => value.replace(/\|/g, "\\|");

export const formatLeaderboardMarkdown = (model: LeaderboardModel): string => {
  const header = ["Model", "Version", "Accuracy", "Epochs", "Accelerators", "Contributor", "Logs"];
  const lines = [`| ${header.join(" | ")} |`, `| ${header.map(() => "---").join(" | ")} |`];
  for (const row of model.rows) {
    const cells = [
      row.model,
      row.best_version,
      row.accuracy_text,
      String(row.epochs_trained),
      String(row.accelerators),
      row.contributor,
      `[logs](${row.tensorboard_logs})`
    ];
    lines.push(`| ${cells.map(escapeCell).join(" | ")} |`);
  }
  return `${lines.join("\n")}\n`;
};

export const formatLeaderboardJson = (model: LeaderboardModel): string =>
  `${JSON.stringify(model, null, 2)}\n`;

export const contributorStats = (history: TrainingHistory): ContributorStats[] => {
  const stats = new Map<string, ContributorStats>();
  const entryFor = (contributor: string): ContributorStats => {
    const existing = stats.get(contributor);
    if (existing) {
      return existing;
    }
    const created: ContributorStats = { contributor, runs: 0, models: [], scripts_authored: [] };
    stats.set(contributor, created);
    return created;
  };

  for (const [model, runs] of history.models) {
    for (const run of runs) {
      const entry = entryFor(run.record.contributor);
      entry.runs += 1;
      if (!entry.models.includes(model)) {
        entry.models.push(model);
      }
    }
  }

  for (const [script, authors] of history.scriptAuthors) {
    for (const author of authors) {
      const entry = entryFor(author);
      if (!entry.scripts_authored.includes(script)) {
        entry.scripts_authored.push(script);
      }
    }
  }

  return Array.from(stats.values()).sort((a, b) => {
    if (a.runs !== b.runs) {
      return b.runs - a.runs;
    }
    return a.contributor < b.contributor ? -1 : a.contributor > b.contributor ? 1 : 0;
  });
};

export const formatContributorsText = (stats: ContributorStats[]): string => {
  const lines = stats.map((entry) => {
    const models = entry.models.length > 0 ? ` [${entry.models.join(", ")}]` : "";
    const authored =
      entry.scripts_authored.length > 0 ? `; authored ${entry.scripts_authored.join(", ")}` : "";
    return `${entry.contributor}: ${entry.runs} run(s)${models}${authored}`;
  });
  return `${lines.join("\n")}\n`;
};
