/**
 * Storage Module Index
 */

export {
  StorageReconciler,
  type ResourceStatus,
  type EnsureReport,
  type StorageDestroyReport,
  type StorageReconcilerOptions,
  type StorageRunOptions,
} from "./reconciler.js";
