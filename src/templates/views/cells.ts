import { escapeHtml } from '../../html/escape.js';
import type { EmptyDisplayData, NullDisplayData, RowDataData, ValueDisplayData } from '../types.js';

export const valueDisplay = (data: ValueDisplayData): string =>
  `<td class="text-start ${escapeHtml(data.class)}${data.condition_field ? ' condition' : ''}">${data.value}</td>\n`;

export const nullDisplay = (data: NullDisplayData): string =>
  `<td data-decimals="${data.data_decimals}" data-type="${data.data_type}" class="${escapeHtml(data.classes)} null">`
  + '<em>NULL</em></td>\n';

export const emptyDisplay = (data: EmptyDisplayData): string =>
  `<td class="${escapeHtml(data.classes)}"></td>\n`;

export const rowData = (data: RowDataData): string => {
  const originalLength = data.original_length !== '' ? ` data-originallength="${escapeHtml(data.original_length)}"` : '';
  return `<td data-decimals="${data.decimals}" data-type="${data.type}"${originalLength}`
    + ` class="${escapeHtml(data.td_class)}">${data.value}</td>\n`;
};
