#!/usr/bin/env node
// Restore cursor visibility on exit. Ink hides the cursor and may not
// restore it if the process is killed or crashes.
process.on("exit", () => {
  if (process.stdout.isTTY) process.stdout.write("\x1B[?25h");
});

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runClean } from "./commands/clean.js";
import { runList } from "./commands/list.js";
import { DEFAULT_MANIFEST, runReconcile } from "./commands/run.js";
import { runTest } from "./commands/test.js";
import { describeError, DockhandError } from "./core/errors.js";
import { setDebug } from "./core/output.js";
import { isWorkRoot, workPaths } from "./core/paths.js";

const hostDataRoot = process.env.DOCKHAND_HOST_DATA || null;

// When invoked with no arguments, launch the dashboard (if inside a working
// root) or show help (if outside).
if (process.argv.length <= 2 && (await isWorkRoot(process.cwd()))) {
  if (!process.stdin.isTTY) {
    process.stderr.write("dockhand: the dashboard requires an interactive terminal. Use 'dockhand <command>'.\n");
    process.exit(1);
  }
  const { render } = await import("ink");
  const React = await import("react");
  const { App } = await import("./tui/App.js");
  const { waitUntilExit } = render(React.createElement(App, { paths: workPaths(process.cwd()) }));
  await waitUntilExit();
  process.exit(0);
}

/**
 * Handle errors escaping a command handler: print `dockhand: <message>`
 * (with the app for per-app errors) and exit 1.
 */
function handleCliError(err: unknown): never {
  let message = describeError(err);
  if (err instanceof DockhandError && err.app) {
    message = `${err.app}: ${err.message}`;
  } else if (err instanceof Error) {
    message = err.message;
  }
  process.stderr.write(`dockhand: ${message}\n`);
  process.exit(1);
}

const cli = yargs(hideBin(process.argv))
  .scriptName("dockhand")
  .usage("$0 <command> [options]")
  .option("debug", {
    type: "boolean",
    default: false,
    describe: "Print the commands run and the fingerprints compared",
  })
  .middleware((argv) => {
    if (argv.debug) setDebug(true);
  })
  .command(
    "run",
    "Reconcile every app of the manifest once",
    (yargs) =>
      yargs
        .option("c", {
          alias: "config",
          type: "string",
          default: DEFAULT_MANIFEST,
          describe: "Manifest file",
        })
        .option("d", {
          alias: "working-dir",
          type: "string",
          default: ".",
          describe: "Working root holding data/, cache/, repos/ and archives/",
        })
        .option("f", {
          alias: "force",
          type: "boolean",
          default: false,
          describe: "Restart (and rebuild) every enabled app, even when unchanged",
        })
        .epilog(
          "Apps restart when their rendered compose files or variables change. A commit that only " +
            "touches a build context (a Dockerfile, say) changes neither; use --force to rebuild it.",
        ),
    async (argv) => {
      try {
        const result = await runReconcile({
          config: argv.c,
          workingDir: argv.d,
          force: argv.f,
          hostDataRoot,
        });
        if (result && !result.ok) process.exit(1);
      } catch (err: unknown) {
        handleCliError(err);
      }
    },
  )
  .command(
    "test",
    "Render the compose files of the current directory and start them in the foreground",
    (yargs) =>
      yargs
        .option("d", {
          alias: "working-dir",
          type: "string",
          describe: "Working root (default: a temporary directory)",
        })
        .option("e", {
          alias: "env",
          type: "string",
          array: true,
          default: [] as string[],
          describe: "Environment variable, KEY=value (repeatable)",
        })
        .option("v", {
          alias: "env-file",
          type: "string",
          describe: "Environment variable file",
        })
        .option("r", {
          alias: "replacement",
          type: "string",
          array: true,
          default: [] as string[],
          describe: "Replacement, KEY=value (repeatable)",
        })
        .option("p", {
          alias: "replacements-file",
          type: "string",
          describe: "Replacements file",
        })
        .option("c", {
          alias: "compose-file",
          type: "string",
          array: true,
          default: [] as string[],
          describe: "Compose file, in override order (repeatable; default docker-compose.yml)",
        }),
    async (argv) => {
      try {
        await runTest({
          workingDir: argv.d,
          environment: argv.e,
          environmentFile: argv.v,
          replacements: argv.r,
          replacementsFile: argv.p,
          composeConfig: argv.c,
          hostDataRoot,
        });
      } catch (err: unknown) {
        handleCliError(err);
      }
    },
  )
  .command(
    ["list", "ls"],
    "List the apps known to the working root",
    (yargs) =>
      yargs.option("d", {
        alias: "working-dir",
        type: "string",
        default: ".",
        describe: "Working root",
      }),
    async (argv) => {
      try {
        await runList({ workingDir: argv.d });
      } catch (err: unknown) {
        handleCliError(err);
      }
    },
  )
  .command(
    "clean",
    "Review and delete archived data directories",
    (yargs) =>
      yargs
        .option("d", {
          alias: "working-dir",
          type: "string",
          default: ".",
          describe: "Working root",
        })
        .option("yes", {
          type: "boolean",
          default: false,
          describe: "Delete every archive without asking",
        }),
    async (argv) => {
      try {
        await runClean({ workingDir: argv.d, autoConfirm: argv.yes });
      } catch (err: unknown) {
        handleCliError(err);
      }
    },
  )
  .demandCommand(1, "Run 'dockhand --help' for usage information")
  .strict()
  .help()
  .version("0.1.0");

if (process.argv.length <= 2) {
  cli.showHelp();
  process.exit(0);
}

await cli.parseAsync();
