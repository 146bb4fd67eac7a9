import type { Command } from "commander";
import { type CliDeps, commandContext } from "../lib/context";
import { unwrap } from "../lib/errors";
import { formatColumns, formatDateTime, formatSize } from "../lib/output";
import { resolveStartPath } from "../lib/resolve";

export function registerLsCommand(program: Command, deps: CliDeps): void {
  program
    .command("ls [path]")
    .description("List a directory by path or id (default: drive root)")
    .action(async (arg: string | undefined) => {
      const { formatter, signal, connect } = commandContext(program, deps);
      const { client } = connect();

      const dir = await resolveStartPath(client, arg, signal);
      const entries = unwrap(await client.entries.listChildren(dir.id, signal));
      const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));

      const rows = sorted.map((e) => ({
        type: e.kind,
        modified: formatDateTime(e.lastModifiedAt),
        size: e.kind === "file" ? formatSize(e.size) : "",
        id: e.id,
        name: e.name,
      }));

      formatter.output(
        sorted,
        () => {
          if (rows.length === 0) return `${dir.name}: empty`;
          return formatColumns(
            ["TYPE", "MODIFIED", "SIZE", "ID", "NAME"],
            rows.map((r) => [r.type, r.modified, r.size, String(r.id), r.name])
          );
        },
        rows
      );
    });
}
