/**
 * Errors surfaced to the user as plain text before a non-zero exit
 */
export class ShipitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class NoEligibleProposals extends ShipitError {}

export class InvalidDirectory extends ShipitError {
  constructor(readonly directory: string, reason = "is not a directory") {
    super(`${directory} ${reason}`);
  }
}

export class SameBranchRejection extends ShipitError {
  constructor(readonly branch: string) {
    super(
      `Source and target branch are both "${branch}". ` +
        "Nothing to merge, cancel and choose different branches."
    );
  }
}

export class MalformedProposal extends ShipitError {
  constructor(readonly webLink: string, reason: string) {
    super(`Skipping merge proposal ${webLink || "(no link)"}: ${reason}`);
  }
}

export class InvalidDefault extends ShipitError {}

export class EnvironmentProvisionFailure extends ShipitError {}

export class NetworkingTimeout extends EnvironmentProvisionFailure {}

export class ChildProcessFailure extends ShipitError {
  constructor(
    readonly command: string,
    readonly status: number,
    readonly output = ""
  ) {
    super(
      `\`${command}\` exited with status ${status}` + (output ? `\n${output.trimEnd()}` : ""),
      status > 0 ? status : 1
    );
  }
}

export class ConfigError extends ShipitError {}

export class CredentialsError extends ShipitError {}

export class LaunchpadRequestError extends ShipitError {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    super(`Launchpad request failed: ${status} ${statusText} (${url})`);
  }
}
