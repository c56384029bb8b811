import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EtlConfigService } from './etl-config.service';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
  ],
  providers: [EtlConfigService],
  exports: [EtlConfigService],
})
export class EtlConfigModule {}
