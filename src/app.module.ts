import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { loadConfiguration } from './config/configuration';
import { GitHubActivityModule } from './github-activity.module';

@Module({
  imports: [
    // Loads .env into process.env before the options below are read
    ConfigModule.forRoot({ isGlobal: true }),
    GitHubActivityModule.forRoot(loadConfiguration(process.env)),
  ],
})
export class AppModule {}
