import mysql from 'mysql2';

/**
 * MySQL quoting rules and server-specific statements
 */
export class MySqlDialect {
  protected readonly dialect = 'mysql';

  /**
   * Creates a new MySqlDialect instance
   * @param isAmazonRds - Kill queries go through the RDS procedure
   */
  public constructor(private readonly isAmazonRds = false) {}

  /**
   * Quotes an identifier using MySQL backtick syntax
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `\`${id.replaceAll('`', '``')}\``;
  }

  /**
   * Quotes a string literal with the driver's escaping rules
   */
  quoteString(value: string): string {
    return mysql.escape(value);
  }

  /**
   * Statement that kills a server thread
   */
  getKillQuery(processId: number): string {
    return this.isAmazonRds ? `CALL mysql.rds_kill(${processId});` : `KILL ${processId};`;
  }
}
