import { fileURLToPath } from "node:url";
import { main } from "./main";

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
      process.stderr.write(`upsctl failed: ${message}\n`);
      process.exitCode = 1;
    });
}
