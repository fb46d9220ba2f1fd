import { escapeHtml } from '../../html/escape.js';
import type { TemplateContext } from '../template.js';
import type {
  ColumnOrderData,
  NavigationData,
  OptionsBlockData,
  ResultsOperationsData,
  TableData
} from '../types.js';

const ROWS_PER_PAGE_CHOICES = [25, 50, 100, 250, 500];

const checked = (condition: boolean): string => (condition ? ' checked' : '');

const navigationButton = (
  data: NavigationData,
  { generator }: TemplateContext,
  pos: number,
  label: string,
  title: string,
  extra = ''
): string =>
  '<td>\n'
  + `  <form action="${generator.url.route('/sql')}" method="post"${extra}>\n`
  + `    ${generator.url.getHiddenInputs({ ...data.hidden_fields, pos })}\n`
  + `    <input type="submit" name="navig" class="btn btn-secondary ajax" value="${label}" title="${title}">\n`
  + '  </form>\n'
  + '</td>\n';

const navigationView = (data: NavigationData, context: TemplateContext, uniqueId: number): string => {
  const { generator } = context;
  let html = '<table class="navigation d-print-none">\n<tr>\n<td class="navigation_separator"></td>\n';

  if (!data.is_showing_all) {
    if (data.pos > 0) {
      html += navigationButton(data, context, 0, '&lt;&lt;', 'Begin');
      html += navigationButton(data, context, data.pos_previous, '&lt;', 'Previous');
    }
    html += data.page_selector;
    if (!data.is_last_page) {
      html += navigationButton(data, context, data.pos_next, '&gt;', 'Next', data.onsubmit);
      const realEnd = data.has_real_end_input ? '\n    <input type="hidden" name="find_real_end" value="1">' : '';
      html += '<td>\n'
        + `  <form action="${generator.url.route('/sql')}" method="post"${data.onsubmit}>\n`
        + `    ${generator.url.getHiddenInputs({ ...data.hidden_fields, pos: data.pos_last })}${realEnd}\n`
        + '    <input type="submit" name="navig" class="btn btn-secondary ajax" value="&gt;&gt;" title="End">\n'
        + '  </form>\n'
        + '</td>\n';
    }
  }

  if (data.has_show_all) {
    html += '<td>\n'
      + `  <form action="${generator.url.route('/sql')}" method="post">\n`
      + `    ${generator.url.getHiddenInputs({ ...data.hidden_fields, session_max_rows: data.session_max_rows, pos: 0 })}\n`
      + `    <input type="checkbox" name="navig" id="showAll_${uniqueId}" class="showAllRows" value="all"${checked(data.is_showing_all)}>\n`
      + `    <label for="showAll_${uniqueId}">Show all</label>\n`
      + '  </form>\n'
      + '</td>\n';
  }

  html += '<td class="navigation_goto">\n'
    + `  <form action="${generator.url.route('/sql')}" method="post" class="maxRowsForm">\n`
    + `    ${generator.url.getHiddenInputs({ ...data.hidden_fields, pos: data.pos })}\n`
    + '    <label for="sessionMaxRowsSelect">Number of rows:</label>\n'
    + '    <select class="autosubmit" name="session_max_rows" id="sessionMaxRowsSelect">\n';
  for (const choice of ROWS_PER_PAGE_CHOICES) {
    const selected = data.max_rows === choice ? ' selected' : '';
    html += `      <option value="${choice}"${selected}>${choice}</option>\n`;
  }
  html += '    </select>\n  </form>\n</td>\n';

  if (data.sort_by_key !== null) {
    html += '<td>\n'
      + `  <form action="${generator.url.route('/sql')}" method="post" id="table_results_sort_by_key">\n`
      + `    ${generator.url.getHiddenInputs(data.sort_by_key.hidden_fields)}\n`
      + '    Sort by key:\n'
      + '    <select name="sql_query" class="autosubmit">\n';
    for (const option of data.sort_by_key.options) {
      const selected = option.is_selected ? ' selected' : '';
      html += `      <option value="${escapeHtml(option.value)}"${selected}>${escapeHtml(option.content)}</option>\n`;
    }
    html += '    </select>\n  </form>\n</td>\n';
  }

  return `${html}<td class="navigation_separator"></td>\n</tr>\n</table>\n`;
};

const radio = (name: string, value: string, label: string, current: string): string =>
  `  <div class="form-check">\n`
  + `    <input class="form-check-input" type="radio" name="${name}" id="${name}_${value}" value="${value}"${checked(current === value)}>\n`
  + `    <label class="form-check-label" for="${name}_${value}">${label}</label>\n`
  + '  </div>\n';

const checkbox = (name: string, label: string, isChecked: boolean): string =>
  '  <div class="form-check">\n'
  + `    <input class="form-check-input" type="checkbox" name="${name}" id="${name}" value="1"${checked(isChecked)}>\n`
  + `    <label class="form-check-label" for="${name}">${label}</label>\n`
  + '  </div>\n';

const optionsView = (options: OptionsBlockData, data: TableData, { generator }: TemplateContext): string => {
  let html = `<form method="post" action="${generator.url.route('/sql')}" name="displayOptionsForm" class="ajax d-print-none">\n`
    + generator.url.getHiddenInputs({
      db: data.db,
      table: data.table,
      sql_query: data.sql_query,
      goto: data.goto,
      display_options_form: 1,
    })
    + `\n<div class="options_block" data-sliders-state="${data.default_sliders_state}">\n`
    + radio('pftext', 'P', 'Partial texts', options.pftext)
    + radio('pftext', 'F', 'Full texts', options.pftext);
  if (data.relwork && data.displaywork) {
    html += radio('relational_display', 'K', 'Relational key', options.relational_display)
      + radio('relational_display', 'D', 'Display column for relationships', options.relational_display);
  }
  html += checkbox('display_binary', 'Show binary contents', options.display_binary)
    + checkbox('display_blob', 'Show BLOB contents', options.display_blob)
    + checkbox('hide_transformation', 'Hide browser transformation', options.hide_transformation);
  if (options.possible_as_geometry) {
    html += radio('geoOption', 'GEOM', 'Geometry', options.geo_option);
  }
  html += radio('geoOption', 'WKT', 'Well Known Text', options.geo_option)
    + radio('geoOption', 'WKB', 'Well Known Binary', options.geo_option);
  return `${html}</div>\n<input class="btn btn-primary" type="submit" value="Go">\n</form>\n`;
};

const columnOrderInputs = (columnOrder: ColumnOrderData): string => {
  let html = '';
  if (columnOrder.order !== false) {
    html += `<input class="col_order" type="hidden" value="${columnOrder.order.join(',')}">\n`;
  }
  if (columnOrder.visibility !== false) {
    html += `<input class="col_visib" type="hidden" value="${columnOrder.visibility.join(',')}">\n`;
  }
  if (!columnOrder.is_view) {
    html += `<input class="table_create_time" type="hidden" value="${escapeHtml(columnOrder.table_create_time)}">\n`;
  }
  return html;
};

const bulkLinksView = (data: TableData, { generator }: TemplateContext): string => {
  const formId = `resultsForm_${data.unique_id}`;
  const action = (value: string, icon: string, label: string): string =>
    `  <button class="btn btn-link mult_submit" type="submit" name="submit_mult" value="${value}" title="${label}">`
    + `${generator.getIcon(icon, label)}</button>\n`;

  let html = '<div class="d-print-none">\n'
    + `  <input type="checkbox" id="${formId}_checkall" class="checkall_box" title="Check all">\n`
    + `  <label for="${formId}_checkall">Check all</label>\n`
    + '  <em class="with-selected">With selected:</em>\n'
    + action('edit', 'b_edit', 'Edit')
    + action('copy', 'b_insrow', 'Copy')
    + action('delete', 'b_drop', 'Delete');
  if (data.has_export_button) html += action('export', 'b_tblexport', 'Export');
  html += '</div>\n'
    + generator.url.getHiddenInputs({ clause_is_unique: data.clause_is_unique, sql_query: data.sql_query, goto: data.goto })
    + '\n';
  return html;
};

const operationsView = (operations: ResultsOperationsData, { generator }: TemplateContext): string => {
  let html = '<fieldset class="d-print-none">\n<legend>Query results operations</legend>\n';
  if (operations.has_print_link) {
    html += `<button type="button" class="btn btn-link jsPrintButton">${generator.getIcon('b_print', 'Print', true)}</button>\n`
      + `<button type="button" class="btn btn-link copyQueryResultsToClipboard">${generator.getIcon('b_insrow', 'Copy to clipboard', true)}</button>\n`;
  }
  if (!operations.has_procedure) {
    if (operations.has_export_link) {
      html += generator.linkOrButton(generator.url.route('/table/export'), operations.url_params, generator.getIcon('b_tblexport', 'Export', true))
        + '\n';
    }
    html += generator.linkOrButton(generator.url.route('/table/chart'), operations.url_params, generator.getIcon('b_chart', 'Display chart', true))
      + '\n';
    if (operations.has_geometry) {
      html += generator.linkOrButton(
        generator.url.route('/table/gis-visualization'),
        operations.url_params,
        generator.getIcon('b_globe', 'Visualize GIS data', true)
      ) + '\n';
    }
  }
  const viewParams = { db: operations.url_params.db, table: operations.url_params.table, sql_query: operations.url_params.sql_query, printview: '1' };
  html += `<span>${generator.linkOrButton(generator.url.route('/view/create'), viewParams, generator.getIcon('b_view_add', 'Create view', true), { class: 'create_view ajax' })}</span>\n`;
  return `${html}</fieldset>\n`;
};

/**
 * The complete result grid: message, navigation, display options, the table
 * itself, bulk actions and result operations.
 */
export const tableView = (data: TableData, context: TemplateContext): string => {
  const { generator } = context;
  const navigation = data.navigation === null ? '' : navigationView(data.navigation, context, data.unique_id);
  const { headers } = data;

  let html = data.sql_query_message + navigation
    + `<input class="save_cells_at_once" type="hidden" value="${data.save_cells_at_once ? '1' : '0'}">\n`
    + `<div class="common_hidden_inputs">\n${generator.url.getHiddenInputs({ db: data.db, table: data.table })}\n</div>\n`;

  if (headers.options !== null) html += optionsView(headers.options, data, context);

  if (headers.has_bulk_actions_form) {
    html += `<form method="post" name="resultsForm" id="resultsForm_${data.unique_id}" class="ajax">\n`
      + `${generator.url.getHiddenInputs({ db: data.db, table: data.table, goto: data.goto })}\n`;
  }

  html += '<div class="table-responsive-md">\n'
    + `<table class="table table-striped table-hover table-sm table_results data ajax w-auto" data-uniqueId="${data.unique_id}"`
    + ` dir="${escapeHtml(data.text_dir)}">\n`;
  if (headers.column_order !== null) html += columnOrderInputs(headers.column_order);
  html += '<thead>\n<tr>\n'
    + headers.button
    + headers.table_headers_for_columns
    + headers.column_at_right_side
    + '\n</tr>\n</thead>\n'
    + `<tbody>\n${data.body}</tbody>\n</table>\n</div>\n`;

  if (data.has_bulk_links) html += bulkLinksView(data, context);
  if (headers.has_bulk_actions_form) html += '</form>\n';

  html += navigation;
  if (data.operations !== null) html += operationsView(data.operations, context);
  return html;
};
