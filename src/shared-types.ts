/**
 * VNS Registry - Shared Type Definitions
 * Closed choice sets persisted as small integer codes
 */

// ============================================================================
// ENUMS & CONSTANTS
// ============================================================================

export enum UserRole {
  ADMIN = 0,
  STUDENT = 1,
  INSTRUCTOR = 3,
  TA = 4,
}

export enum TemplateVisibility {
  PRIVATE = 0,
  PROTECTED = 1,
  PUBLIC = 2,
}

export enum NodeType {
  VIRTUAL_NODE = 0,
  BLACK_HOLE = 1,
  HUB = 2,
  WEB_SERVER = 3,
  SYSTEM_ROUTER = 4,
}

export const USER_ROLE_LABELS: Record<UserRole, string> = {
  [UserRole.ADMIN]: "VNS Admin",
  [UserRole.STUDENT]: "Student",
  [UserRole.INSTRUCTOR]: "Instructor",
  [UserRole.TA]: "TA",
};

export const VISIBILITY_LABELS: Record<TemplateVisibility, string> = {
  [TemplateVisibility.PRIVATE]: "Private - owner only",
  [TemplateVisibility.PROTECTED]: "Protected - owner and organization only",
  [TemplateVisibility.PUBLIC]: "Public - anyone",
};

export const NODE_TYPE_LABELS: Record<NodeType, string> = {
  [NodeType.VIRTUAL_NODE]: "Virtual Node",
  [NodeType.BLACK_HOLE]: "Black Hole",
  [NodeType.HUB]: "Hub",
  [NodeType.WEB_SERVER]: "Web Server",
  [NodeType.SYSTEM_ROUTER]: "System Router",
};

export const NAME_MAX_LENGTH = 30;
export const PORT_NAME_MAX_LENGTH = 5;
export const MIN_PREFIX_LENGTH = 1;
export const MAX_PREFIX_LENGTH = 32;
