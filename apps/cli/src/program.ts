/**
 * rtb-pricer command-line program.
 *
 * Wires configuration, logging and the codec for each command. No price
 * logic lives here; see commands.ts and @rtb-pricer/crypto.
 */

import { Command } from "commander";
import type { DestinationStream, Logger } from "pino";
import { createPricer, PricerError, type Pricer } from "@rtb-pricer/crypto";
import { ConfigError, loadConfig, type CliOverrides } from "./config.js";
import { createLogger } from "./logger.js";
import { runDecrypt, runEncrypt, runInspect } from "./commands.js";

export const EXIT_PRICE_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface ProgramIo {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  setExitCode: (code: number) => void;
  /** Where logs go; stderr when omitted */
  logDestination?: DestinationStream;
}

interface Wired {
  pricer: Pricer;
  log: Logger;
}

export function createProgram(io: ProgramIo): Command {
  const program = new Command();

  program
    .name("rtb-pricer")
    .description("Encrypt and decrypt RTB winning-price tokens")
    .version("1.0.0")
    .option("--debug", "trace every encryption step at debug level")
    .option("--scale-factor <number>", "micros per currency unit (default: PRICE_SCALE_FACTOR or 1000000)")
    .option("--key-encoding <mode>", "hex, base64 or plain (default: PRICE_KEY_ENCODING or hex)");

  function wire(command: Command): Wired {
    const config = loadConfig(io.env, command.optsWithGlobals<CliOverrides>());
    const log = createLogger(config.logLevel, io.logDestination);
    const pricer = createPricer({ ...config, trace: log.child({ component: "codec" }) });
    return { pricer, log };
  }

  function run(action: () => string): void {
    try {
      io.stdout(`${action()}\n`);
    } catch (err) {
      if (err instanceof ConfigError) {
        createLogger("error", io.logDestination).error({ variable: err.variable }, err.message);
        io.setExitCode(EXIT_CONFIG_ERROR);
        return;
      }
      if (err instanceof PricerError) {
        createLogger("error", io.logDestination).error({ code: err.code }, err.message);
        io.setExitCode(EXIT_PRICE_ERROR);
        return;
      }
      throw err;
    }
  }

  program
    .command("encrypt")
    .description("encrypt a price into a URL-safe token")
    .argument("<seed>", "per-auction seed, e.g. the impression id")
    .argument("<price>", "price in currency units, e.g. 1.50")
    .action((seed: string, price: string, _options: unknown, command: Command) => {
      run(() => {
        const { pricer, log } = wire(command);
        return runEncrypt(pricer, log, seed, price);
      });
    });

  program
    .command("decrypt")
    .description("verify and decrypt a price token")
    .argument("<token>", "URL-safe base64 token")
    .action((token: string, _options: unknown, command: Command) => {
      run(() => {
        const { pricer, log } = wire(command);
        return runDecrypt(pricer, log, token);
      });
    });

  program
    .command("inspect")
    .description("print the iv, encrypted price and signature of a token without verifying it")
    .argument("<token>", "URL-safe base64 token")
    .action((token: string) => {
      run(() => runInspect(token));
    });

  return program;
}
