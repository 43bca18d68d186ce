import { runCli } from "../archive/cli/driver";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[parseweather] Unexpected failure:", error);
    process.exitCode = 1;
  });
