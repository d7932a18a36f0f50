#!/usr/bin/env node
// 入口：cron 每次调用执行一次命令后退出

import "dotenv/config";
import { runCli } from "./commands.js";


runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[cli] 未处理的异常:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
