/**
 * How a command's text is interpreted by the database.
 */
export type CommandType = "Text" | "StoredProcedure" | "TableDirect";

/**
 * A parameterized query, loggable as a payload.
 *
 * The formatter renders its type, its text and every bound parameter instead
 * of the generic text conversion.
 *
 * @example
 * ```typescript
 * await logger.debug(
 *   new QueryCommand("SELECT * FROM Orders WHERE Id = @id", { "@id": 42 })
 * );
 * ```
 */
export class QueryCommand {
  readonly text: string;
  readonly commandType: CommandType;
  readonly parameters: ReadonlyMap<string, unknown>;

  constructor(
    text: string,
    parameters: ReadonlyMap<string, unknown> | Record<string, unknown> = {},
    commandType: CommandType = "Text"
  ) {
    this.text = text;
    this.commandType = commandType;
    this.parameters =
      parameters instanceof Map ? new Map(parameters) : new Map(Object.entries(parameters));
  }
}
