import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerClear } from "./app/Clear";
import { registerConvert } from "./app/Convert";
import { registerList } from "./app/List";
import { registerReject } from "./app/Reject";
import { registerScan } from "./app/Scan";
import { registerStitch } from "./app/Stitch";

const logger = createDefaultLoggerFromEnv({ logFileName: "pano.log" });
const cli = cac("pano");

registerScan(cli, logger);
registerList(cli, logger);
registerReject(cli, logger);
registerStitch(cli, logger);
registerConvert(cli, logger);
registerClear(cli, logger);

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
