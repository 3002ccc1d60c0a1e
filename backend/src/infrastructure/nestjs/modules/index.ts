export { CoreModule, DATABASE_TOKEN } from './core.module';
