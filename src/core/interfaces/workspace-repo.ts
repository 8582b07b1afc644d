export type Workspace = {
  root: string;
  functionsDir: string;
  artifactsDir: string;
};

export interface WorkspaceRepo {
  createWorkspace: () => Promise<Workspace>;
  /** Creates (if needed) and returns the private directory for one function. */
  createFunctionDirectory: (
    workspace: Workspace,
    functionName: string,
  ) => Promise<string>;
  removeWorkspace: (workspace: Workspace) => Promise<void>;
}
