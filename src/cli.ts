#!/usr/bin/env node
import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import { XmlMapper } from "./core/Mapper.js";
import { loadRuleModule } from "./core/RuleModule.js";
import { encodeXml, parseXml } from "./parsing/xml.js";
import { createConsoleLogger, type LogLevel } from "./utils/logger.js";

interface CliOptions {
  batch?: string;
  out?: string[];
  verbose?: boolean;
  quiet?: boolean;
}

const program = new Command();

program
  .name("xml-rulemap")
  .description("Map one XML document into another with declarative rules")
  .version("0.1.0")
  .argument("<rules>", "Rules module (default export: rule document)")
  .argument("<input>", "Source XML file")
  .argument("[output]", "Destination XML file (stdout if omitted)")
  .option("-b, --batch <basePath>", "Map every element matched by basePath separately")
  .option("-o, --out <files...>", "Output files for --batch, one per match")
  .option("-v, --verbose", "Log every applied rule")
  .option("-q, --quiet", "Only log errors")
  .action(async (rulesFile: string, inputFile: string, outputFile: string | undefined, options: CliOptions) => {
    const level: LogLevel = options.verbose ? "info" : options.quiet ? "error" : "warn";
    const logger = createConsoleLogger(level);

    try {
      const { rules, functions } = await loadRuleModule(rulesFile);
      const mapper = new XmlMapper({ rules, functions, logger });
      const source = parseXml(fs.readFileSync(inputFile, "utf-8"));
      const encoding = mapper.meta.outputEncoding;

      if (options.batch) {
        const outFiles = options.out ?? [];
        const results = mapper.runBatch(source, options.batch, inputFile);
        if (results.length > outFiles.length) {
          throw new Error(
            `Base ${options.batch} matched ${results.length} elements but only ${outFiles.length} output files were given`,
          );
        }
        results.forEach((root, i) => {
          const target = outFiles[i];
          if (target === undefined) return;
          fs.mkdirSync(path.dirname(path.resolve(target)), { recursive: true });
          fs.writeFileSync(target, encodeXml(root, encoding));
        });
        if (results.length < outFiles.length) {
          logger.warn(`Number of output filepaths was ${outFiles.length}; expected ${results.length}`);
        }
        return;
      }

      const out = encodeXml(mapper.run(source, inputFile), encoding);
      if (outputFile) {
        fs.mkdirSync(path.dirname(path.resolve(outputFile)), { recursive: true });
        fs.writeFileSync(outputFile, out);
      } else {
        process.stdout.write(out);
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
