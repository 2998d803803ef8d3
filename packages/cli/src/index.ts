#!/usr/bin/env node

import * as p from "@clack/prompts";
import { getErrorMessage, type RevokeRequest } from "@svcsync/core";
import { Command } from "commander";
import { createRequire } from "module";
import { login } from "@/commands/auth/login";
import { revoke } from "@/commands/auth/revoke";
import { authStatus } from "@/commands/auth/status";
import {
  addContext,
  listContexts,
  removeContext,
  renameContext,
  selectContext,
  useContext,
} from "@/commands/context";
import {
  addEndpoint,
  listEndpoints,
  removeEndpoint,
} from "@/commands/endpoints";
import {
  addRegistry,
  listRegistries,
  removeRegistry,
  syncRegistries,
} from "@/commands/registry/manage";
import { initAppContext } from "@/lib/context";
import type {
  SessionOutcome,
  SyncChange,
  UserVerification,
} from "@/lib/events";
import { log, ui } from "@/lib/log";

const require = createRequire(import.meta.url);
const packageJson: { version: string } = require("../package.json");

type ContextOption = { context?: string };

const program = new Command();

program
  .name("svcsync")
  .description("Keep service endpoints in sync with their registries")
  .version(packageJson.version)
  .option("-v, --verbose", "Enable verbose/debug output")
  .option("-q, --quiet", "Only print results and errors")
  .option("-c, --context <name>", "Use this context instead of the selected one")
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook("preAction", (thisCommand) => {
    const opts: { verbose?: boolean; quiet?: boolean; context?: string } =
      thisCommand.opts();
    if (opts.verbose) {
      log.setVerbose(true);
    } else if (opts.quiet) {
      log.setLevel("error");
    }
    initAppContext({ contextName: opts.context });
  })
  .showHelpAfterError();

// =============================================================================
// context - Named endpoint catalogs
// =============================================================================

const context = program
  .command("context")
  .description("Manage contexts (named endpoint catalogs)");

context
  .command("list")
  .description("List contexts")
  .action(
    handle(async () => {
      const items = await listContexts();
      log.print(ui.header("Contexts", items.length));
      for (const item of items) {
        const marker = item.selected ? ui.symbols.active : ui.symbols.inactive;
        log.print(
          `${ui.indent()}${marker} ${item.name} ${ui.muted(
            `(${item.endpoints} endpoint${item.endpoints === 1 ? "" : "s"})`
          )}`
        );
      }
    })
  );

context
  .command("add <name>")
  .description("Add an empty context")
  .action(
    handle(async (name: string) => {
      await addContext(name);
      log.success(`Added context ${ui.code(name.trim())}`);
    })
  );

context
  .command("remove <name>")
  .description("Remove a context")
  .action(
    handle(async (name: string) => {
      await removeContext(name);
      log.success(`Removed context ${ui.code(name)}`);
    })
  );

context
  .command("rename <name> <newName>")
  .description("Rename a context")
  .action(
    handle(async (name: string, newName: string) => {
      await renameContext(name, newName);
      log.success(`Renamed ${ui.code(name)} to ${ui.code(newName.trim())}`);
    })
  );

context
  .command("select <name>")
  .description("Select the context used by default")
  .action(
    handle(async (name: string) => {
      await selectContext(name);
      log.success(`Selected context ${ui.code(name)}`);
    })
  );

context
  .command("use <registry>")
  .description(
    "Import a service registry (host or root URL) into a context, select it and sign in"
  )
  .option("-n, --name <name>", "Context name (defaults to the registry host)")
  .option(
    "--no-auth",
    "Skip signing in (implied when no OAuth2 grant flow is available)"
  )
  .action(
    handle(async (hostOrUrl: string, options: { name?: string; auth: boolean }) => {
      const spinner = await log.spinner(`Connecting to ${hostOrUrl}...`);
      const result = await withInterrupt((signal) =>
        useContext(hostOrUrl, {
          name: options.name,
          noAuth: !options.auth,
          signal,
          onUserVerification: (verification) => {
            spinner.stop();
            printUserVerification(verification);
          },
        })
      ).finally(() => spinner.stop());

      printChanges(result.changes);
      printOutcomes(result.sessions);
      if (result.authSkipped) {
        log.warn("Sign-in skipped: no OAuth2 grant flow is available");
      }
      log.success(
        `Using context ${ui.code(result.context)} ${ui.countParens(
          result.endpoints.length
        )}`
      );
    })
  );

// =============================================================================
// endpoints - Endpoints of one context
// =============================================================================

const endpoints = program
  .command("endpoints")
  .description("Manage the endpoints of a context");

endpoints
  .command("list")
  .description("List endpoints")
  .action(
    handle(async (_options: unknown, command: Command) => {
      const items = await listEndpoints(contextOf(command));
      if (items.length === 0) {
        log.info("No endpoints");
        return;
      }
      log.print(
        ui.tableMulti(
          ["ID", "TYPE", "SOURCE", "URL"],
          items.map((item) => [
            item.isDefault ? `${item.id} ${ui.symbols.active}` : item.id,
            item.type || ui.muted("-"),
            item.source ?? ui.muted("manual"),
            item.url,
          ])
        )
      );
    })
  );

endpoints
  .command("add <id>")
  .description("Add an endpoint by hand")
  .requiredOption("-u, --url <url>", "Endpoint URL")
  .option("-t, --type <type>", "Service type (group:artifact:version)")
  .option(
    "-a, --auth <key=value>",
    "Authentication property. Repeatable; dotted keys nest.",
    collect,
    []
  )
  .action(
    handle(
      async (
        id: string,
        options: { url: string; type?: string; auth: string[] },
        command: Command
      ) => {
        const endpoint = await addEndpoint(id, {
          ...options,
          ...contextOf(command),
        });
        log.success(`Added endpoint ${ui.code(endpoint.id)}`);
      }
    )
  );

endpoints
  .command("remove <id>")
  .description("Remove an endpoint")
  .action(
    handle(async (id: string, _options: unknown, command: Command) => {
      await removeEndpoint(id, contextOf(command));
      log.success(`Removed endpoint ${ui.code(id)}`);
    })
  );

// =============================================================================
// registry - Service registries of one context
// =============================================================================

const registry = program
  .command("registry")
  .description("Manage the service registries of a context");

registry
  .command("list")
  .description("List registries")
  .action(
    handle(async (_options: unknown, command: Command) => {
      const items = await listRegistries(contextOf(command));
      if (items.length === 0) {
        log.info(`No registries. Run ${ui.command("svcsync registry add <id> <url>")}`);
        return;
      }
      log.print(
        ui.tableMulti(
          ["ID", "ENDPOINTS", "URL"],
          items.map((item) => [item.id, String(item.endpoints), item.url])
        )
      );
    })
  );

registry
  .command("add <id> <url>")
  .description("Add a registry and import its services")
  .action(
    handle(async (id: string, url: string, _options: unknown, command: Command) => {
      const result = await addRegistry(id, url, contextOf(command));
      printChanges(result.changes);
      log.success(`Added registry ${ui.code(id)}`);
    })
  );

registry
  .command("remove <id>")
  .description("Remove a registry and the endpoints it imported")
  .action(
    handle(async (id: string, _options: unknown, command: Command) => {
      const removed = await removeRegistry(id, contextOf(command));
      for (const endpointId of removed) {
        log.print(ui.syncStatus("remove", endpointId));
      }
      log.success(`Removed registry ${ui.code(id)}`);
    })
  );

registry
  .command("sync")
  .description("Re-import the services of every registry")
  .action(
    handle(async (_options: unknown, command: Command) => {
      const spinner = await log.spinner("Synchronizing...");
      const result = await syncRegistries(contextOf(command)).finally(() =>
        spinner.stop()
      );
      printChanges(result.changes);
      log.success(
        `Synchronized ${result.reports.length} registr${
          result.reports.length === 1 ? "y" : "ies"
        }`
      );
    })
  );

// =============================================================================
// auth - Sessions of the endpoints of one context
// =============================================================================

const auth = program
  .command("auth")
  .description("Manage the sessions of a context's endpoints");

auth
  .command("status [endpoints...]")
  .description("Show the session serving each endpoint")
  .action(
    handle(async (ids: string[], _options: unknown, command: Command) => {
      const items = await authStatus({ endpoints: ids, ...contextOf(command) });
      if (items.length === 0) {
        log.info("No endpoint requires authentication");
        return;
      }
      log.print(
        ui.tableMulti(
          ["STATUS", "ENDPOINTS", "VALID UNTIL", "SCOPES"],
          items.map((item) => [
            ui.authStatus(item.status),
            item.endpoints.join(", "),
            item.validUntil === null
              ? ui.muted("-")
              : new Date(item.validUntil * 1000).toISOString(),
            item.scopes.join(" "),
          ])
        )
      );
    })
  );

auth
  .command("login [endpoints...]")
  .description("Sign in to every session of the selected endpoints")
  .option("--force-refresh", "Refresh sessions that are still valid")
  .option("--revoke-existing", "Drop stored sessions before signing in")
  .action(
    handle(
      async (
        ids: string[],
        options: { forceRefresh?: boolean; revokeExisting?: boolean },
        command: Command
      ) => {
        const result = await withInterrupt((signal) =>
          login({
            endpoints: ids,
            ...contextOf(command),
            forceRefresh: Boolean(options.forceRefresh),
            revokeExisting: Boolean(options.revokeExisting),
            signal,
            onUserVerification: printUserVerification,
          })
        );

        printOutcomes(result.sessions);
        for (const sessionId of result.refreshSkipped) {
          log.warn(`${sessionId}: nothing to refresh, sign in first`);
        }
        for (const sessionId of result.withoutRefreshToken) {
          log.info(ui.hint(`${sessionId}: no refresh token was issued`));
        }
        if (result.interrupted) {
          log.warn("Interrupted");
          process.exitCode = 130;
        }
      }
    )
  );

auth
  .command("revoke [endpoints...]")
  .description("Sign out; endpoints sharing a session are signed out too")
  .option("-f, --force", "Do not ask for confirmation")
  .action(
    handle(
      async (ids: string[], options: { force?: boolean }, command: Command) => {
        const result = await revoke({
          endpoints: ids,
          ...contextOf(command),
          force: Boolean(options.force),
          confirm: confirmRevoke,
        });

        if (result.affected.length === 0) {
          log.info("Nothing revoked");
          return;
        }
        log.success(`Signed out ${result.affected.join(", ")}`);
      }
    )
  );

// =============================================================================
// Parse and run
// =============================================================================

program
  .parseAsync(process.argv)
  .then(() => {
    // Explicitly exit to avoid hanging on open HTTP connections (e.g., from openid-client)
    process.exit(process.exitCode ?? 0);
  })
  .catch((err: unknown) => {
    log.error(getErrorMessage(err));
    process.exit(1);
  });

// =============================================================================
// Helpers
// =============================================================================

function handle<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      log.error(getErrorMessage(err));
      process.exitCode = 1;
    }
  };
}

/** The global --context option, as command options */
function contextOf(command: Command): ContextOption {
  const opts: ContextOption = command.optsWithGlobals();
  return opts.context ? { context: opts.context } : {};
}

function collect(value: string, previous: string[]) {
  return [...previous, value];
}

/** Runs `fn` with a signal aborted on Ctrl-C. */
async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>) {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

async function confirmRevoke(request: RevokeRequest) {
  const scopes = request.scopes.length > 0 ? ` [${request.scopes.join(" ")}]` : "";
  const answer = await p.confirm({
    message: `Revoke session ${request.index + 1}/${request.total} for ${request.endpointIds.join(", ")}${scopes}?`,
    initialValue: false,
  });
  return !p.isCancel(answer) && answer;
}

function printUserVerification(verification: UserVerification) {
  log.print("");
  if (verification.userCode) {
    log.print(`${ui.indent()}${ui.muted("Code")}   ${ui.bold(verification.userCode)}`);
  }
  log.print(`${ui.indent()}${ui.muted("URL")}    ${ui.link(verification.url)}`);
  log.print("");
}

function printChanges(changes: SyncChange[]) {
  for (const change of changes) {
    log.print(ui.syncStatus(change.action, change.endpointId));
  }
}

function printOutcomes(sessions: SessionOutcome[]) {
  for (const session of sessions) {
    const endpointList = session.endpoints.join(", ");
    if (session.outcome === "skipped") {
      log.warn(`Skipped ${endpointList}`);
    } else {
      log.print(`${ui.symbols.success} ${endpointList} ${ui.muted(`(${session.outcome})`)}`);
    }
  }
}
