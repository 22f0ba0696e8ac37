import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { ConfigService } from './config.service';
import { validateEnv } from './env.validation';

/**
 * Validated configuration, shared by every module.
 *
 * Sources in increasing precedence: `.env`, `.env.local`, the process
 * environment, then `overrides` (command-line flags). The environment is
 * validated once, when forRoot() is called, so overrides must be known by then.
 */
@Module({})
export class ConfigModule {
  static forRoot(overrides: Readonly<Record<string, string>> = {}): DynamicModule {
    return {
      module: ConfigModule,
      global: true,
      imports: [
        NestConfigModule.forRoot({
          isGlobal: true,
          envFilePath: ['.env.local', '.env'],
          validate: (env) => validateEnv({ ...env, ...overrides }),
        }),
      ],
      providers: [ConfigService],
      exports: [ConfigService],
    };
  }
}
