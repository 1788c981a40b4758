#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Parses options, builds the CloudFormation data source, runs the detector
 * and prints the result in the requested format.
 */

import { pathToFileURL } from "url";
import { Command, CommanderError } from "commander";
import type { RunConfig, StackDataSource } from "@/types";
import { CloudFormationStackSource } from "@aws/cloudFormationSource";
import { createCloudFormationClient } from "@aws/clientFactory";
import {
  DEFAULT_PROFILE,
  DEFAULT_SESSION_DURATION_SECONDS,
  DEFAULT_SESSION_NAME,
  parseRunConfig,
} from "@core/config";
import { Detector } from "@detector/detector";
import { getFormatter } from "@output/formatter";
import { setupLogger } from "@utils/logger";
import pkg from "../package.json";

const logger = setupLogger("find-serverless-stacks:cli");

interface CliOptions {
  region?: string;
  profile?: string;
  output?: string;
  workers?: string;
  maxAttempts?: string;
  assumeRole?: string;
  sessionName?: string;
  duration?: string;
  externalId?: string;
}

interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Data source for one run, with a hook to release its client.
 */
export interface StackSourceHandle {
  source: StackDataSource;
  close(): void;
}

/**
 * Collaborators of the CLI, replaceable in tests.
 */
export interface CliDependencies {
  createSource(config: RunConfig): StackSourceHandle;
  stdout: OutputStream;
  stderr: OutputStream;
}

function createCloudFormationSource(config: RunConfig): StackSourceHandle {
  const client = createCloudFormationClient({
    region: config.region,
    profile: config.profile,
    assumeRole: config.assumeRole,
    maxAttempts: config.maxAttempts,
  });
  return {
    source: new CloudFormationStackSource(client, config.region),
    close: () => client.destroy(),
  };
}

const defaultDependencies: CliDependencies = {
  createSource: createCloudFormationSource,
  stdout: process.stdout,
  stderr: process.stderr,
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function createProgram(deps: CliDependencies): Command {
  return new Command()
    .name("find-serverless-stacks")
    .description(
      "Find CloudFormation stacks deployed by the Serverless Framework\n\n" +
        "Stacks are identified by the presence of a ServerlessDeploymentBucket resource."
    )
    .version(pkg.version, "-V, --version", "Display version number")
    .requiredOption("-r, --region <region>", "AWS region to scan (required)")
    .option("-p, --profile <name>", "AWS profile name", DEFAULT_PROFILE)
    .option("-o, --output <format>", "Output format (json, tsv)", "json")
    .option("-w, --workers <count>", "Number of stacks processed concurrently", "10")
    .option("--max-attempts <count>", "AWS API attempts per request, including retries", "4")
    .option("--assume-role <arn>", "ARN of the IAM role to assume")
    .option("--session-name <name>", "Session name for the assumed role session", DEFAULT_SESSION_NAME)
    .option(
      "--duration <seconds>",
      "Session duration in seconds (900-43200)",
      String(DEFAULT_SESSION_DURATION_SECONDS)
    )
    .option("--external-id <id>", "External ID for AssumeRole (required by some roles)")
    .addHelpText(
      "after",
      `

Examples:
  $ find-serverless-stacks --region us-east-1
  $ find-serverless-stacks -r eu-west-1 -p production -o tsv
  $ find-serverless-stacks -r us-east-1 --assume-role arn:aws:iam::123456789012:role/ReadOnly
`
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text),
    });
}

function toConfigInput(options: CliOptions): Record<string, unknown> {
  return {
    region: options.region,
    profile: options.profile,
    output: options.output,
    workers: options.workers,
    maxAttempts: options.maxAttempts,
    assumeRole: options.assumeRole
      ? {
          roleArn: options.assumeRole,
          sessionName: options.sessionName,
          durationSeconds: options.duration,
          externalId: options.externalId,
        }
      : undefined,
  };
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments without the node executable and script path
 * @param overrides - Replacement collaborators for tests
 * @returns Process exit code
 */
export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDependencies> = {}
): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const fail = (message: string): number => {
    deps.stderr.write(`Error: ${message}\n`);
    return 1;
  };

  const program = createProgram(deps);
  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  let config: RunConfig;
  try {
    config = parseRunConfig(toConfigInput(program.opts<CliOptions>()));
  } catch (error) {
    return fail(`invalid configuration: ${errorMessage(error)}`);
  }

  const formatter = getFormatter(config.output);
  const handle = deps.createSource(config);
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("Interrupted, aborting scan");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const detector = new Detector(handle.source, config.region, { maxWorkers: config.workers });
    const stacks = await detector.detect(controller.signal);
    deps.stdout.write(`${formatter.format(stacks)}\n`);
    return 0;
  } catch (error) {
    return fail(`detection failed: ${errorMessage(error)}`);
  } finally {
    process.removeListener("SIGINT", onSigint);
    handle.close();
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isMainModule()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Error: ${errorMessage(error)}\n`);
      process.exitCode = 1;
    }
  );
}
