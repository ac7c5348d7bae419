export interface ArtifactReference {
  readonly id: string;
  readonly version: string;
  readonly location?: string;
}

export interface DeploymentReference {
  readonly selector: string;
  readonly workload: string;
  readonly revision?: string;
}
