export type Paths = {
  projectDir: string
  databasePath: string
  stopFile: string
}

export type ProjectOptions = {
  projectDir?: string
}
