/**
 * Configuration Module Index
 */

export {
  AnsibleConfigurationDriver,
  failingHost,
  type ConfigurationDriver,
  type ConfigureOptions,
  type ConfigureReport,
  type PlaybookRun,
  type AnsibleDriverOptions,
} from "./driver.js";
export { renderInventory, type InventoryOptions } from "./inventory.js";
