import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerGroupImagesets } from "./app/GroupImagesets";
import { registerInferTemplate } from "./app/InferTemplate";
import { registerMaterializeSequence } from "./app/MaterializeSequence";

const logger = createDefaultLoggerFromEnv();
const cli = cac("imageset-sweep");

registerInferTemplate(cli, logger);
registerGroupImagesets(cli, logger);
registerMaterializeSequence(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
