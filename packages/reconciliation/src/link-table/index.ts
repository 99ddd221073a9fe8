export { LINK_TABLE_COLUMNS, buildLinkTableIndex, loadLinkTable } from './link-table-index.js';
