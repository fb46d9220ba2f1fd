import { createHmac, timingSafeEqual } from 'node:crypto';

/**
 * HMAC-SHA256 of a query (or where clause), hex encoded
 */
export const signSqlQuery = (sqlQuery: string, secret: string): string =>
  createHmac('sha256', secret).update(sqlQuery).digest('hex');

export const checkSqlQuerySignature = (sqlQuery: string, signature: string, secret: string): boolean => {
  const expected = Buffer.from(signSqlQuery(sqlQuery, secret), 'utf8');
  const given = Buffer.from(signature, 'utf8');
  return expected.length === given.length && timingSafeEqual(expected, given);
};
