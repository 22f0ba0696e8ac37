#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { CliArgs, USAGE, parseCliArgs } from './cli/args';
import { ConfigService } from './config/config.service';
import { errorMessage } from './types/error-taxonomy';
import { VERSION } from './version';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  let cli: CliArgs;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n\n${USAGE}`);
    process.exit(2);
  }

  if (cli.help) {
    process.stdout.write(USAGE);
    return;
  }

  try {
    const app = await NestFactory.create(AppModule.forRoot(cli.env), { bufferLogs: true });

    const config = app.get(ConfigService);
    app.useLogger(config.logLevels);

    // Cancels the refresh loop and waits for a running cycle on SIGINT/SIGTERM
    app.enableShutdownHooks();

    if (!config.isProduction) {
      const document = SwaggerModule.createDocument(
        app,
        new DocumentBuilder()
          .setTitle('ifwatch')
          .setDescription('Network interface change monitor')
          .setVersion(VERSION)
          .addTag('Monitor', 'Snapshot, diff and metrics endpoints')
          .addTag('Health', 'Health check endpoints')
          .build(),
      );
      SwaggerModule.setup('docs', app, document);
    }

    await app.listen(config.port, config.host);

    logger.log(`🚀 ifwatch ${VERSION} listening on http://${config.host}:${config.port}`);
    logger.log(
      `Watching ${config.interfaceName} (/${config.prefixLength}) every ${config.pollingIntervalMs / 1000}s`,
    );
    logger.log(
      config.stateFile ? `Persisting state to ${config.stateFile}` : 'State persistence disabled',
    );
  } catch (error) {
    logger.error('Failed to start:', error instanceof Error ? error.stack : errorMessage(error));
    process.exit(1);
  }
}

void bootstrap();
