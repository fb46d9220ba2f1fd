import type { RelationalDisplayMode, RowActionLinksPosition, SlidersState } from '../config/settings.js';
import type { MappedType } from '../database/field-metadata.js';
import type { UrlParams } from '../html/url.js';
import type { GeometryDisplay, MaxRows, PartialTextMode } from '../session/display-session.js';

export type GridEditConfig = 'double-click' | 'click' | 'disabled';

export interface PageSelectorData {
  url_params: UrlParams;
  /** Page drop-down markup */
  page_selector: string;
}

export interface HeaderColumn {
  column_name: string;
  comments: string;
  is_column_hidden: boolean;
  is_column_numeric: boolean;
  has_condition: boolean;
  /** Sortable headers only */
  order_link?: string;
  is_browse_pointer_enabled?: boolean;
  is_browse_marker_enabled?: boolean;
}

export interface TableHeadersForColumnsData {
  is_sortable: boolean;
  columns: HeaderColumn[];
}

export interface CommentForRowData {
  /** table → column → comment */
  comments_map: Record<string, Record<string, string>>;
  column_name: string;
  table_name: string;
  limit_chars: number;
}

export interface ValueDisplayData {
  class: string;
  condition_field: boolean;
  value: string;
}

export interface NullDisplayData {
  data_decimals: number;
  data_type: MappedType;
  classes: string;
}

export interface EmptyDisplayData {
  classes: string;
}

export interface RowActionLink {
  url: string | null;
  params: UrlParams | null;
  string: string | null;
}

export interface CheckboxAndLinksData {
  position: RowActionLinksPosition;
  has_checkbox: boolean;
  edit: RowActionLink & { clause_is_unique: boolean };
  copy: RowActionLink;
  delete: RowActionLink;
  row_number: number;
  where_clause: string;
  /** JSON of the condition map */
  condition: string;
  js_conf: string;
  grid_edit_config: GridEditConfig;
}

export interface RowDataData {
  value: string;
  td_class: string;
  decimals: number;
  type: MappedType;
  original_length: string;
}

export interface SortByKeyOption {
  value: string;
  content: string;
  is_selected: boolean;
}

export interface SortByKeyData {
  hidden_fields: UrlParams;
  options: SortByKeyOption[];
}

export interface NavigationData {
  page_selector: string;
  number_total_page: number;
  has_show_all: boolean;
  hidden_fields: UrlParams;
  session_max_rows: MaxRows;
  is_showing_all: boolean;
  max_rows: MaxRows;
  pos: number;
  sort_by_key: SortByKeyData | null;
  pos_previous: number;
  pos_next: number;
  pos_last: number;
  is_last_page: boolean;
  is_last_page_known: boolean;
  has_real_end_input: boolean;
  /** onsubmit attribute, leading space included */
  onsubmit: string;
}

export interface OptionsBlockData {
  geo_option: GeometryDisplay;
  hide_transformation: boolean;
  display_blob: boolean;
  display_binary: boolean;
  relational_display: RelationalDisplayMode;
  possible_as_geometry: boolean;
  pftext: PartialTextMode;
}

export interface ColumnOrderData {
  order: number[] | false;
  visibility: number[] | false;
  is_view: boolean;
  table_create_time: string;
}

export interface TableHeadersData {
  column_order: ColumnOrderData | null;
  options: OptionsBlockData | null;
  has_bulk_actions_form: boolean;
  button: string;
  table_headers_for_columns: string;
  column_at_right_side: string;
}

export interface ResultsOperationsData {
  has_procedure: boolean;
  has_geometry: boolean;
  has_print_link: boolean;
  has_export_link: boolean;
  url_params: UrlParams;
}

export interface TableData {
  sql_query_message: string;
  navigation: NavigationData | null;
  headers: TableHeadersData;
  body: string;
  has_bulk_links: boolean;
  has_export_button: boolean;
  clause_is_unique: boolean;
  operations: ResultsOperationsData | null;
  db: string;
  table: string;
  unique_id: number;
  sql_query: string;
  goto: string;
  unlim_num_rows: number;
  displaywork: boolean;
  relwork: boolean;
  save_cells_at_once: boolean;
  default_sliders_state: SlidersState;
  text_dir: string;
  is_browse_distinct: boolean;
}

/** Template name → data it renders */
export interface TemplateViews {
  page_selector: PageSelectorData;
  table_headers_for_columns: TableHeadersForColumnsData;
  comment_for_row: CommentForRowData;
  value_display: ValueDisplayData;
  null_display: NullDisplayData;
  empty_display: EmptyDisplayData;
  checkbox_and_links: CheckboxAndLinksData;
  row_data: RowDataData;
  table: TableData;
}

export type TemplateName = keyof TemplateViews;
