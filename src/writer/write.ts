// 将序列化后的 Feed 写出到输出目标：文件路径或可写流

import { writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Writable } from "node:stream";
import type { OutputTarget } from "../pipeline/types.js";
import { OutputWriteError } from "../pipeline/errors.js";
import { logger } from "../logger/index.js";


/** 写入流但不关闭，流的生命周期归调用方 */
function writeToStream(stream: Writable, content: string): Promise<void> {
  return new Promise((resolve, reject) => {
    // 写失败时流随后还会触发 error 事件，由这个 once 监听接住
    const onError = (err: Error) => reject(err);
    stream.once("error", onError);
    stream.write(content, "utf-8", (err) => {
      if (err) {
        reject(err);
        return;
      }
      stream.off("error", onError);
      resolve();
    });
  });
}


/** 字符串目标写为 UTF-8 文件（自动创建父目录）；失败包装为 OutputWriteError */
export async function writeOutput(target: OutputTarget, content: string): Promise<void> {
  try {
    if (typeof target === "string") {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
    } else {
      await writeToStream(target, content);
    }
  } catch (err) {
    throw new OutputWriteError(target, err);
  }
  logger.info("writer", "输出已写出", { target: typeof target === "string" ? target : "<stream>", bytes: Buffer.byteLength(content, "utf-8") });
}
