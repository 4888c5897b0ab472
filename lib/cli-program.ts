import { Command } from "commander";
import { existsSync } from "fs";
import { DockManager, type MutationResult } from "./dock-manager";
import type { LayoutError } from "./errors";
import { getDefaultLayoutPath } from "./layout-file";
import { getSnapshotStore } from "./snapshots";

interface FileOptions {
  file?: string;
}

interface AddOptions extends FileOptions {
  title?: string;
  content?: string;
  target?: string;
  direction: string;
  minSize?: string;
}

function fail(error: LayoutError | string): never {
  const message = typeof error === "string" ? error : `${error.message} (${error.code})`;
  console.error(`Error: ${message}`);
  process.exit(1);
}

function parseNumberArg(value: string, label: string): number {
  const n = Number(value);
  if (value.trim() === "" || Number.isNaN(n)) fail(`${label} must be a number: ${value}`);
  return n;
}

function layoutPath(opts: FileOptions): string {
  return opts.file ?? getDefaultLayoutPath();
}

/** Load the layout file, or start empty when it does not exist yet */
function openLayout(path: string): DockManager {
  // Engine chatter would mix with command output
  process.env.LOG_LEVEL = process.env.LOG_LEVEL || "warn";
  const manager = new DockManager();
  if (existsSync(path)) {
    const loaded = manager.loadFromFile(path);
    if (!loaded.ok) fail(loaded.error);
  }
  return manager;
}

function commit(manager: DockManager, path: string, result: MutationResult): void {
  if (!result.ok) fail(result.error);
  const saved = manager.saveToFile(path);
  if (!saved.ok) fail(saved.error);
}

function fileOption(cmd: Command): Command {
  return cmd.option("--file <path>", "Layout file (defaults to LAYOUT_FILE or <DATA_DIR>/layout.json)");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("splitdock")
    .description("Binary split-tree panel layout manager")
    .version("0.1.0");

  fileOption(program.command("show"))
    .description("Print the layout tree")
    .action((opts: FileOptions) => {
      console.log(openLayout(layoutPath(opts)).dumpTree());
    });

  fileOption(program.command("list"))
    .description("List panels, one per line: id, title, content reference")
    .action((opts: FileOptions) => {
      for (const panel of openLayout(layoutPath(opts)).listPanels()) {
        console.log(`${panel.id}\t${panel.title}\t${panel.contentRef}`);
      }
    });

  fileOption(program.command("add <id>"))
    .description("Add a panel, beside --target or next to the rightmost panel")
    .option("--title <title>", "Panel title")
    .option("--content <ref>", "Content reference")
    .option("--target <id>", "Node to split")
    .option("--direction <dir>", "left, right, top or bottom", "right")
    .option("--min-size <px>", "Minimum panel size")
    .action((id: string, opts: AddOptions) => {
      const path = layoutPath(opts);
      const manager = openLayout(path);
      const spec = {
        id,
        title: opts.title,
        contentRef: opts.content,
        minSize: opts.minSize === undefined ? undefined : parseNumberArg(opts.minSize, "--min-size"),
      };
      const result =
        opts.target === undefined ? manager.addPanel(spec, opts.direction) : manager.addPanelAt(spec, opts.target, opts.direction);
      commit(manager, path, result);
      console.log(`Added panel ${id}`);
    });

  fileOption(program.command("remove <id>"))
    .description("Remove a panel; its sibling takes the freed space")
    .action((id: string, opts: FileOptions) => {
      const path = layoutPath(opts);
      const manager = openLayout(path);
      commit(manager, path, manager.remove(id));
      console.log(`Removed panel ${id}`);
    });

  fileOption(program.command("ratio <splitId> <ratio>"))
    .description("Set a split's ratio (clamped to 0.1-0.9)")
    .action((splitId: string, ratio: string, opts: FileOptions) => {
      const path = layoutPath(opts);
      const manager = openLayout(path);
      commit(manager, path, manager.updateSplitRatio(splitId, parseNumberArg(ratio, "ratio")));
      const split = manager.findNode(splitId);
      if (split?.kind === "split") console.log(`Split ${splitId} ratio set to ${split.ratio}`);
    });

  fileOption(program.command("min-size <px>"))
    .description("Set the default minimum panel size (clamped to 50-1000)")
    .action((px: string, opts: FileOptions) => {
      const path = layoutPath(opts);
      const manager = openLayout(path);
      commit(manager, path, manager.setMinPanelSize(parseNumberArg(px, "size")));
      console.log(`Minimum panel size set to ${manager.minPanelSize}`);
    });

  fileOption(program.command("validate"))
    .description("Check the layout's structure; exits 1 when invalid")
    .action((opts: FileOptions) => {
      const report = openLayout(layoutPath(opts)).validate();
      for (const error of report.errors) console.log(`error: ${error}`);
      for (const warning of report.warnings) console.log(`warning: ${warning}`);
      console.log(report.isValid ? "Layout is valid" : "Layout is invalid");
      if (!report.isValid) process.exitCode = 1;
    });

  const snapshot = program.command("snapshot").description("Named layout snapshots");

  fileOption(snapshot.command("save <name>"))
    .description("Store the current layout under a name")
    .action((name: string, opts: FileOptions) => {
      const saved = getSnapshotStore().save(name, openLayout(layoutPath(opts)).save());
      if (!saved.ok) fail(saved.error);
      console.log(`Saved snapshot ${name} (${saved.panelCount} panels)`);
    });

  fileOption(snapshot.command("load <name>"))
    .description("Replace the layout with a stored snapshot")
    .action((name: string, opts: FileOptions) => {
      const path = layoutPath(opts);
      const manager = openLayout(path);
      const document = getSnapshotStore().load(name);
      if (document === undefined) fail(`Snapshot not found: ${name}`);
      commit(manager, path, manager.load(document));
      console.log(`Loaded snapshot ${name} (${manager.panelCount} panels)`);
    });

  snapshot
    .command("list")
    .description("List snapshots, newest first")
    .action(() => {
      for (const info of getSnapshotStore().list()) {
        console.log(`${info.name}\t${info.panelCount}\t${new Date(info.updatedAt).toISOString()}`);
      }
    });

  snapshot
    .command("delete <name>")
    .description("Delete a snapshot")
    .action((name: string) => {
      if (!getSnapshotStore().delete(name)) fail(`Snapshot not found: ${name}`);
      console.log(`Deleted snapshot ${name}`);
    });

  program
    .command("serve")
    .description("Start the layout server")
    .option("--port <number>", "Port to listen on", "3000")
    .action(async (opts: { port: string }) => {
      process.env.PORT = process.env.PORT || opts.port;
      await import("../server");
    });

  return program;
}
