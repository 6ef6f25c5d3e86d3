export { MemoryGitModule } from './memory_git_module';
export type { MemoryCommit } from './memory_git_module';
