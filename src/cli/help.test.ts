import { describe, it, expect } from "vitest";

import { createFormatter } from "../ui/fmt.js";
import { getHelpCommand, renderCommandHelp, renderRootHelp } from "./help.js";
import { COMMAND_HANDLERS } from "./commands.js";

const plain = createFormatter({ stream: { isTTY: false }, env: {} });

describe("help", () => {
  it("documents every command", () => {
    for (const name of Object.keys(COMMAND_HANDLERS)) {
      expect(getHelpCommand(name)?.name).toBe(name);
    }
    expect(getHelpCommand("train")).toBeUndefined();
  });

  it("groups commands in the root help", () => {
    const lines = renderRootHelp(plain).split("\n");

    expect(lines[0]).toBe("training-ledger // model training history tooling");
    expect(lines.slice(1, 6)).toEqual([
      "",
      "Ledger:",
      "  verify        check ledger structure and history invariants",
      "  lookup        print one training run",
      "  append        record a new run as the model's next version"
    ]);
  });

  it("renders usage and flags for one command", () => {
    const entry = getHelpCommand("append");
    if (!entry) {
      throw new Error("append help missing");
    }
    const text = renderCommandHelp(plain, entry);

    expect(text).toContain("Usage:\n  training-ledger append <model> --from <run.json> [--authors a,b]\n");
    expect(text).toContain(`  ${"--from <path>".padEnd(20)} JSON file holding the run record\n`);
  });
});
