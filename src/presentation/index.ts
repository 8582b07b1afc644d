import { Command } from 'commander';
import { AwilixContainer, createContainer, InjectionMode } from 'awilix';
import { BaseLogger } from 'pino';
import { Cradle, diContainerInit, PackagerSettings } from './di-container-init';
import { createLogger, initialize } from './logging';

export const VERSION = '1.0.0';

export type ProgramOptions = {
  template: string;
  output?: string;
  bucket?: string;
  prefix?: string;
  region?: string;
  keepWorkspace?: boolean;
  logLevel?: string;
};

export function buildProgram(
  dependencyInjectionOverride?: ({
    diContainer,
    logger,
    settings,
  }: {
    diContainer: AwilixContainer<Cradle>;
    logger: BaseLogger;
    settings: PackagerSettings;
  }) => void,
  stdout: NodeJS.WritableStream = process.stdout,
): Command {
  const program = new Command();

  program
    .name('pyfn-packager')
    .description(
      'Build, archive and upload the Python functions of a SAM template, then rewrite the template to reference the uploaded code.',
    )
    .version(VERSION)
    .requiredOption('-t, --template <path>', 'template to package')
    .option(
      '-o, --output <path>',
      'write the rewritten template here instead of standard output',
    )
    .option('-b, --bucket <name>', 'bucket receiving the archives')
    .option('-p, --prefix <prefix>', 'key prefix placed before the run prefix')
    .option('-r, --region <region>', 'region of the bucket')
    .option('--keep-workspace', 'keep the build workspace after success')
    .option('--log-level <level>', 'log level')
    .action(async () => {
      const options = program.opts<ProgramOptions>();
      const logger = createLogger(options.logLevel);
      initialize(logger);

      const settings: PackagerSettings = {
        bucket: options.bucket,
        region: options.region,
        keyPrefix: options.prefix,
      };
      const diContainer = createContainer<Cradle>({
        injectionMode: InjectionMode.PROXY,
      });
      if (dependencyInjectionOverride) {
        dependencyInjectionOverride({ diContainer, logger, settings });
      } else {
        diContainerInit({ diContainer, logger, settings });
      }

      try {
        const pipeline = diContainer.resolve('pipeline');
        const result = await pipeline.run({
          templatePath: options.template,
          outputPath: options.output,
          keepWorkspace: options.keepWorkspace,
        });
        if (!options.output) {
          stdout.write(result.template);
        }
      } finally {
        await diContainer.dispose();
      }
    });

  return program;
}
