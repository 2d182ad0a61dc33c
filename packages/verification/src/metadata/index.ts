export {
  NULL_PARTITION_VALUE,
  buildPartitionFilter,
  parsePartitionDescriptor,
  formatPartitionDescriptor,
  escapePartitionValue,
  unescapePartitionValue,
} from './partition-filter.js';
export type { PartitionSegment } from './partition-filter.js';
export { TableMetadataService } from './table-metadata-service.js';
