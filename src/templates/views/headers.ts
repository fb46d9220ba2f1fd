import { escapeHtml } from '../../html/escape.js';
import type { CommentForRowData, TableHeadersForColumnsData } from '../types.js';

export const tableHeadersForColumns = (data: TableHeadersForColumnsData): string =>
  data.columns
    .map(column => {
      const classes = ['draggable'];
      if (column.is_column_numeric) classes.push('text-end');
      if (column.is_column_hidden) classes.push('hide');
      if (data.is_sortable && column.is_browse_pointer_enabled) classes.push('pointer');
      if (data.is_sortable && column.is_browse_marker_enabled) classes.push('marker');
      if (!data.is_sortable && column.has_condition) classes.push('condition');
      const content = data.is_sortable ? column.order_link ?? '' : escapeHtml(column.column_name);
      return `<th class="${classes.join(' ')}" data-column="${escapeHtml(column.column_name)}">\n`
        + `  ${content}\n  ${column.comments}\n</th>\n`;
    })
    .join('');

export const commentForRow = (data: CommentForRowData): string => {
  const comment = data.comments_map[data.table_name]?.[data.column_name];
  if (comment === undefined) return '';
  const characters = [...comment];
  const shown = characters.length > data.limit_chars
    ? `${characters.slice(0, data.limit_chars).join('')}…`
    : comment;
  return `<br><span class="tblcomment" title="${escapeHtml(comment)}">${escapeHtml(shown)}</span>\n`;
};
