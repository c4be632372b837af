/**
 * @fileoverview Demo Pages Exports
 *
 * @module @scopelab/demo/pages
 * @license Apache-2.0
 */

export { ScopeDemoPage, UPDATE_FROM_PAGE_BUTTON, UPDATE_FROM_VIEW_BUTTON } from './scope-demo-page';
