export {
  type OrgLink,
  type OrgNode,
  extractLinks,
  attachmentNames,
  parseOrgNodes,
} from './org.js';

export {
  BUCKET_LENGTH,
  attachmentBucket,
  isShardConsistent,
} from './attachments.js';
