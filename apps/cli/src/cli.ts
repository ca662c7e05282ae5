import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { Command, CommanderError } from "commander";
import { z, ZodError } from "zod";
import type { LlmConfig } from "@transcript-digest/types";
import { parseEnv } from "@transcript-digest/config";
import { summarizeTranscript } from "@transcript-digest/core";
import { AppError, NotFoundError, errorMessage } from "@transcript-digest/errors";
import { createTextGenerator } from "@transcript-digest/llm";
import type { ITextGenerator } from "@transcript-digest/llm";
import { createLogger } from "@transcript-digest/logger";
import { generateSummaryFilename } from "./filename.js";
import { buildSummaryMarkdown } from "./markdown.js";

export interface TextSink {
  write(chunk: string): unknown;
}

export interface RunEnv {
  env: Record<string, string | undefined>;
  stdout: TextSink;
  stderr: TextSink;
  createGenerator?: (config: LlmConfig) => ITextGenerator;
  now?: () => Date;
}

const cliOptionsSchema = z.object({
  model: z.string().min(1).optional(),
  output: z.string().min(1).default("."),
  title: z.string().min(1).optional(),
  url: z.string().url().optional(),
  notes: z.string().optional(),
  stdout: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function buildProgram(): Command {
  return new Command()
    .name("transcript-digest")
    .description("Summarize a video transcript into a markdown note with a local or hosted LLM.")
    .argument("<transcript-file>", "plain-text transcript to summarize")
    .option("--model <name>", "model to use (defaults to LLM_MODEL)")
    .option("--output <dir>", "directory for the summary file", ".")
    .option("--title <title>", "title for the summary (defaults to the file name)")
    .option("--url <url>", "source video URL recorded in the summary")
    .option("--notes <text>", "extra guidance for the combined summary")
    .option("--stdout", "print the summary instead of writing a file", false)
    .allowExcessArguments(false);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

async function readTranscript(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new NotFoundError(`Transcript file not found: ${path}`, { details: { path }, cause: err });
    }
    throw err;
  }
}

function describeFailure(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
  }
  return errorMessage(err);
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function runCli(argv: string[], io: RunEnv): Promise<number> {
  const program = buildProgram();
  program.configureOutput({
    writeOut(str) {
      io.stdout.write(str);
    },
    writeErr(str) {
      io.stderr.write(str);
    },
  });
  program.exitOverride();

  try {
    program.parse(argv, { from: "user" });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.code === "commander.helpDisplayed" ? 0 : err.exitCode;
    }
    throw err;
  }

  try {
    const [file = ""] = program.args;
    const options = cliOptionsSchema.parse(program.opts());
    return await summarizeFile(file, options, io);
  } catch (err: unknown) {
    if (err instanceof AppError || err instanceof ZodError) {
      io.stderr.write(`Error: ${describeFailure(err)}\n`);
      return 1;
    }
    throw err;
  }
}

async function summarizeFile(file: string, options: CliOptions, io: RunEnv): Promise<number> {
  const config = parseEnv(io.env);
  const logger = createLogger({
    level: config.logLevel,
    service: "cli",
    pretty: config.nodeEnv === "development",
    destination: io.stderr,
  });

  const transcript = await readTranscript(file);
  const model = options.model ?? config.llm.model;
  const generator = (io.createGenerator ?? createTextGenerator)(config.llm);

  logger.info({ file, model, generator: generator.name }, "Summarizing transcript");
  const result = await summarizeTranscript(transcript, {
    generator,
    model,
    notes: options.notes,
    logger,
  });

  if (!result.success) {
    io.stderr.write(`Error: ${result.errorMessage}\n`);
    return 1;
  }

  const title = options.title ?? basename(file, extname(file));
  const markdown = buildSummaryMarkdown({
    title,
    summary: result.summary,
    model,
    strategy: result.strategy,
    mode: result.mode,
    sourceUrl: options.url,
    generatedAt: (io.now ?? (() => new Date()))(),
  });

  if (options.stdout) {
    io.stdout.write(markdown);
    return 0;
  }

  await mkdir(options.output, { recursive: true });
  const outputPath = join(options.output, generateSummaryFilename(title));
  await writeFile(outputPath, markdown, "utf8");
  logger.info({ path: outputPath, words: result.wordCount }, "Summary saved");
  io.stdout.write(`Saved summary to ${outputPath}\n`);
  return 0;
}
