export const ConversionErrorCode = {
  DIAGRAM_PARSE: "DIAGRAM_PARSE",
  MISSING_ROOT_GOAL: "MISSING_ROOT_GOAL",
  RULES: "RULES",
} as const;

export type ConversionErrorCode = (typeof ConversionErrorCode)[keyof typeof ConversionErrorCode];

export class ConversionError extends Error {
  constructor(
    public code: ConversionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ConversionError";
  }
}

/**
 * The diagram source could not be read as XML at all. Nothing downstream can
 * use a partial diagram, so this always aborts the run.
 */
export class DiagramParseError extends ConversionError {
  constructor(
    public source: string,
    detail: string,
    public line?: number,
    public col?: number,
  ) {
    const at = line !== undefined ? `:${line}${col !== undefined ? `:${col}` : ""}` : "";
    super(ConversionErrorCode.DIAGRAM_PARSE, `cannot parse diagram ${source}${at}: ${detail}`);
    this.name = "DiagramParseError";
  }
}

export class MissingRootGoalError extends ConversionError {
  constructor(public source: string) {
    super(ConversionErrorCode.MISSING_ROOT_GOAL, `no goal with a label in ${source}`);
    this.name = "MissingRootGoalError";
  }
}

export class RulesError extends ConversionError {
  constructor(
    public path: string,
    detail: string,
  ) {
    super(ConversionErrorCode.RULES, `invalid rules file ${path}: ${detail}`);
    this.name = "RulesError";
  }
}
