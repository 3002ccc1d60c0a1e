export {
  GitRepositoryFetcher,
  SimpleGitClient,
  GitClient,
  GitCommandOptions,
  buildGitEnvironment,
  classifyGitError,
} from './GitRepositoryFetcher';
