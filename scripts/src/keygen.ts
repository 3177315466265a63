import { Command, Option } from "commander";
import { createSubscriberKeys, isOutputFormat, OUTPUT_FORMATS, renderKeys } from "./keys.js";

type KeygenOptions = {
  subscriberId: string;
  uniqueKeyId?: string;
  output: string;
};

const program: Command = new Command();

program
  .name("keygen")
  .description("Generate the Ed25519 signing key pair the adapter signs requests with")
  .option("--subscriber-id <id>", "Subscriber ID to embed in output", "investment.example.com")
  .option("--unique-key-id <id>", "Unique key ID registered for the public key")
  .addOption(
    new Option("--output <format>", "Output format").choices(OUTPUT_FORMATS).default("env"),
  )
  .action(() => {
    const opts = program.opts<KeygenOptions>();
    if (!isOutputFormat(opts.output)) {
      program.error(`Unknown output format: ${opts.output}`);
    }
    const keys = createSubscriberKeys(opts.subscriberId, opts.uniqueKeyId);
    console.log(renderKeys(keys, opts.output));
  });

program.parse();
