import { FileFailure } from "./types";

export class ProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileError";
  }
}

export class NoInputFilesError extends ProfileError {
  patterns: string[];

  constructor(patterns: string[], extensions: string[]) {
    super(
      `No ${extensions.join("/")} files found matching the given patterns.`,
    );
    this.name = "NoInputFilesError";
    this.patterns = patterns;
  }
}

export class AllFailedError extends ProfileError {
  failures: FileFailure[];

  constructor(failures: FileFailure[]) {
    super("No files compiled successfully.");
    this.name = "AllFailedError";
    this.failures = failures;
  }
}
