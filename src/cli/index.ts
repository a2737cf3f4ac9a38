#!/usr/bin/env node
// CLI 入口：加载 .env 后运行一次完整管道

import "dotenv/config";
import { run } from "./run.js";


process.exitCode = await run(process.argv.slice(2));
