/** Which of the two compared versions a parse failure belongs to. */
export type VersionSide = 'remote' | 'local'
