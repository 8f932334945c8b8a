import type { Formatter } from "../ui/fmt.js";

export type HelpFlag = {
  name: string;
  description: string;
};

export type HelpCommand = {
  name: string;
  summary: string;
  usage: string;
  flags?: HelpFlag[];
  examples?: string[];
  group: "ledger" | "reporting" | "build";
};

const LEDGER_FLAG: HelpFlag = {
  name: "--ledger <path>",
  description: "ledger file (default: training_history.json or $TRAINING_LEDGER_PATH)"
};

const COMMANDS: HelpCommand[] = [
  {
    name: "verify",
    summary: "check ledger structure and history invariants",
    usage: "training-ledger verify [ledger.json] [--baseline <old.json>]",
    group: "ledger",
    flags: [
      { name: "--baseline <path>", description: "earlier revision; fail if any run was changed or removed" }
    ],
    examples: [
      "training-ledger verify",
      "training-ledger verify training_history.json --baseline previous/training_history.json"
    ]
  },
  {
    name: "lookup",
    summary: "print one training run",
    usage: "training-ledger lookup <model> [version|latest] [--format text|json]",
    group: "ledger",
    flags: [LEDGER_FLAG, { name: "--format <type>", description: "text|json (default: text)" }],
    examples: ["training-ledger lookup densenet121", "training-ledger lookup densenet121 v0 --format json"]
  },
  {
    name: "append",
    summary: "record a new run as the model's next version",
    usage: "training-ledger append <model> --from <run.json> [--authors a,b]",
    group: "ledger",
    flags: [
      LEDGER_FLAG,
      { name: "--from <path>", description: "JSON file holding the run record" },
      { name: "--authors <a,b>", description: "register or extend the script's authors" }
    ],
    examples: ["training-ledger append resnet50v2 --from run.json"]
  },
  {
    name: "leaderboard",
    summary: "rank models by best validation accuracy",
    usage: "training-ledger leaderboard [--format text|markdown|json] [--top N] [--sort accuracy|model]",
    group: "reporting",
    flags: [
      LEDGER_FLAG,
      { name: "--format <type>", description: "text|markdown|json (default: text)" },
      { name: "--top <N>", description: "limit to the first N rows" },
      { name: "--sort <key>", description: "accuracy|model (default: accuracy)" }
    ],
    examples: ["training-ledger leaderboard --format markdown"]
  },
  {
    name: "contributors",
    summary: "runs submitted and scripts authored per contributor",
    usage: "training-ledger contributors [--format text|json]",
    group: "reporting",
    flags: [LEDGER_FLAG, { name: "--format <type>", description: "text|json (default: text)" }]
  },
  {
    name: "targets",
    summary: "resolve per-platform compiler flags for the custom ops",
    usage: "training-ledger targets [targets.json] [--platform win32|linux|darwin] [--target <name>]",
    group: "build",
    flags: [
      { name: "--platform <name>", description: "host platform (default: current)" },
      { name: "--target <name>", description: "resolve a single target" },
      { name: "--format <type>", description: "text|json (default: text)" }
    ],
    examples: ["training-ledger targets --platform win32 --target box_util"]
  }
];

const GROUPS: Array<HelpCommand["group"]> = ["ledger", "reporting", "build"];

const GROUP_TITLES: Record<HelpCommand["group"], string> = {
  ledger: "Ledger:",
  reporting: "Reporting:",
  build: "Build:"
};

const renderCommandLine = (fmt: Formatter, command: HelpCommand): string => {
  if (!fmt.isTTY) {
    return `  ${command.name.padEnd(13)} ${command.summary}`;
  }
  return `  ${fmt.accent(command.name.padEnd(13))} ${command.summary}`;
};

export const getHelpCommand = (name: string): HelpCommand | undefined =>
  COMMANDS.find((command) => command.name === name);

export const renderRootHelp = (fmt: Formatter): string => {
  const lines: string[] = [];

  lines.push(fmt.header("training-ledger // model training history tooling"));
  for (const group of GROUPS) {
    lines.push("");
    lines.push(GROUP_TITLES[group]);
    COMMANDS.filter((command) => command.group === group).forEach((command) =>
      lines.push(renderCommandLine(fmt, command))
    );
  }
  lines.push("");
  lines.push("Global flags:");
  lines.push(`  ${fmt.accent("--config <path>")}  ${fmt.muted("config file (default: training-ledger.config.json)")}`);
  lines.push(`  ${fmt.accent("--help")}           ${fmt.muted("show root or command help")}`);
  lines.push(`  ${fmt.accent("--version")}        ${fmt.muted("print package version")}`);

  return `${lines.join("\n")}\n`;
};

export const renderCommandHelp = (fmt: Formatter, command: HelpCommand): string => {
  const lines: string[] = [];
  lines.push(fmt.header(`training-ledger ${command.name}: ${command.summary}`));
  lines.push("");
  lines.push("Usage:");
  lines.push(`  ${fmt.muted(command.usage)}`);

  if (command.flags && command.flags.length > 0) {
    lines.push("");
    lines.push("Flags:");
    command.flags.forEach((flag) => {
      lines.push(`  ${fmt.accent(flag.name.padEnd(20))} ${fmt.muted(flag.description)}`);
    });
  }

  if (command.examples && command.examples.length > 0) {
    lines.push("");
    lines.push("Examples:");
    command.examples.forEach((example) => {
      lines.push(`  ${fmt.muted(example)}`);
    });
  }

  return `${lines.join("\n")}\n`;
};
