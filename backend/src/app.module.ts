import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CoreModule } from './infrastructure/nestjs/modules';
import { feedbackerConfig } from './infrastructure/config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../.env'],
      load: [feedbackerConfig],
    }),
    CoreModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
