export { printTable } from './table';
export { OutputRenderer, formatDuration } from './renderer';
