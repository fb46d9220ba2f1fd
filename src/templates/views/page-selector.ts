import type { TemplateContext } from '../template.js';
import type { PageSelectorData } from '../types.js';

export const pageSelectorView = (data: PageSelectorData, { generator }: TemplateContext): string =>
  '<td>\n'
  + `  <form action="${generator.url.route('/sql')}" method="post">\n`
  + `    ${generator.url.getHiddenInputs(data.url_params)}\n`
  + `    ${data.page_selector}\n`
  + '  </form>\n'
  + '</td>\n';
