import type { Generator } from '../html/generator.js';
import type { TemplateName, TemplateViews } from './types.js';
import { emptyDisplay, nullDisplay, rowData, valueDisplay } from './views/cells.js';
import { commentForRow, tableHeadersForColumns } from './views/headers.js';
import { checkboxAndLinks } from './views/checkbox-and-links.js';
import { pageSelectorView } from './views/page-selector.js';
import { tableView } from './views/table.js';

export interface TemplateContext {
  generator: Generator;
}

export type TemplateView<K extends TemplateName> = (data: TemplateViews[K], context: TemplateContext) => string;

export type TemplateRegistry = { [K in TemplateName]: TemplateView<K> };

const DEFAULT_VIEWS: TemplateRegistry = {
  page_selector: pageSelectorView,
  table_headers_for_columns: tableHeadersForColumns,
  comment_for_row: commentForRow,
  value_display: valueDisplay,
  null_display: nullDisplay,
  empty_display: emptyDisplay,
  checkbox_and_links: checkboxAndLinks,
  row_data: rowData,
  table: tableView,
};

/**
 * Renders the named views of the result grid. Views can be replaced per
 * instance to change the markup without touching the renderer.
 */
export class Template {
  private readonly views: TemplateRegistry;

  constructor(
    private readonly context: TemplateContext,
    overrides: Partial<TemplateRegistry> = {}
  ) {
    this.views = { ...DEFAULT_VIEWS, ...overrides };
  }

  /**
   * @throws Error when no view is registered under `name`
   */
  render<K extends TemplateName>(name: K, data: TemplateViews[K]): string {
    const view: TemplateView<K> | undefined = this.views[name];
    if (typeof view !== 'function') {
      throw new Error(`Template "${String(name)}" is not registered.`);
    }
    return view(data, this.context);
  }
}
