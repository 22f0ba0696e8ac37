import { DynamicModule, Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { MonitorModule } from './monitor/monitor.module';

@Module({})
export class AppModule {
  /**
   * @param overrides environment variables set on the command line
   */
  static forRoot(overrides: Readonly<Record<string, string>> = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(overrides), MonitorModule],
      controllers: [AppController],
    };
  }
}
