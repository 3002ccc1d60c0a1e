export { CommandRunner } from './CommandRunner';
