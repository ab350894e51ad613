/**
 * Scratch Space Port (Driven Port)
 * Scoped temporary directory: created before `work` runs and removed with
 * everything in it once `work` settles, whether it resolved or rejected.
 */
export interface ScratchSpacePort {
  withDirectory<T>(work: (directory: string) => Promise<T>): Promise<T>;
}
