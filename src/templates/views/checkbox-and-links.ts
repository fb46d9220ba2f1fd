import { escapeHtml } from '../../html/escape.js';
import type { TemplateContext } from '../template.js';
import type { CheckboxAndLinksData } from '../types.js';

const checkboxCell = (data: CheckboxAndLinksData, side: 'left' | 'right'): string =>
  '<td class="text-center d-print-none">\n'
  + `  <input type="checkbox" class="multi_checkbox checkall" id="id_rows_to_delete${data.row_number}_${side}"`
  + ` name="rows_to_delete[${data.row_number}]" value="${escapeHtml(data.where_clause)}">\n`
  + `  <input type="hidden" class="condition_array" value="${escapeHtml(data.condition)}">\n`
  + '</td>\n';

const whereClauseInput = (data: CheckboxAndLinksData): string =>
  data.where_clause !== '' ? `<input type="hidden" class="where_clause" value="${escapeHtml(data.where_clause)}">` : '';

const editCell = (data: CheckboxAndLinksData, { generator }: TemplateContext): string => {
  const { url, params, string, clause_is_unique: unique } = data.edit;
  if (url === null || string === null) return '';
  return `<td class="text-center d-print-none edit_row_anchor${unique ? '' : ' nonunique'}">\n`
    + `  <span class="text-nowrap">${generator.linkOrButton(url, params, string)}${whereClauseInput(data)}</span>\n`
    + '</td>\n';
};

const copyCell = (data: CheckboxAndLinksData, { generator }: TemplateContext): string => {
  const { url, params, string } = data.copy;
  if (url === null || string === null) return '';
  return '<td class="text-center d-print-none">\n'
    + `  <span class="text-nowrap">${generator.linkOrButton(url, params, string)}${whereClauseInput(data)}</span>\n`
    + '</td>\n';
};

const deleteCell = (data: CheckboxAndLinksData, { generator }: TemplateContext): string => {
  const { url, params, string } = data.delete;
  if (url === null || string === null) return '';
  const confirmation = data.js_conf !== '' ? `<div class="hide">${escapeHtml(data.js_conf)}</div>` : '';
  return '<td class="text-center d-print-none">\n'
    + `  <span class="text-nowrap">${generator.linkOrButton(url, params, string, { class: 'delete_row requireConfirm' })}`
    + `${confirmation}</span>\n`
    + '</td>\n';
};

/**
 * Row selection checkbox and edit/copy/delete (or kill) links of one row.
 * Right-hand cells mirror the left-hand order.
 */
export const checkboxAndLinks = (data: CheckboxAndLinksData, context: TemplateContext): string => {
  if (data.position === 'left' || data.position === 'both') {
    return (data.has_checkbox ? checkboxCell(data, 'left') : '')
      + editCell(data, context)
      + copyCell(data, context)
      + deleteCell(data, context);
  }
  if (data.position === 'right') {
    return deleteCell(data, context)
      + copyCell(data, context)
      + editCell(data, context)
      + (data.has_checkbox ? checkboxCell(data, 'right') : '');
  }
  return data.has_checkbox ? checkboxCell(data, 'left') : '';
};
