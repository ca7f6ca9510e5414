/**
 * Command handler exports.
 * @module handlers
 */

export { handleAreas, handleAreasInspect } from './areas.js';
export { handleLogin, handleLogout, handleStatus } from './auth.js';
export {
  handleAutomations,
  handleAutomationsCreate,
  handleAutomationsDebug,
  handleAutomationsDelete,
  handleAutomationsDisable,
  handleAutomationsEdit,
  handleAutomationsEnable,
  handleAutomationsInspect,
  handleAutomationsRename,
  handleAutomationsTrigger,
} from './automations.js';
export { handleCall } from './call.js';
export {
  handleDevices,
  handleDevicesDisable,
  handleDevicesEnable,
  handleDevicesInspect,
  handleDevicesRemove,
} from './devices.js';
export { handleEntities, handleEntitiesInspect } from './entities.js';
export {
  handleHelpers,
  handleHelpersCreateBoolean,
  handleHelpersCreateButton,
  handleHelpersCreateNumber,
  handleHelpersCreateSelect,
  handleHelpersCreateText,
  handleHelpersDelete,
  handleHelpersDisable,
  handleHelpersEditSelect,
  handleHelpersEnable,
  handleHelpersInspect,
  handleHelpersRename,
} from './helpers.js';
export {
  handleScenes,
  handleScenesAddEntity,
  handleScenesCreate,
  handleScenesDelete,
  handleScenesInspect,
  handleScenesRemoveEntity,
} from './scenes.js';
export {
  handleScripts,
  handleScriptsCreate,
  handleScriptsDebug,
  handleScriptsDelete,
  handleScriptsEdit,
  handleScriptsInspect,
  handleScriptsRename,
  handleScriptsRun,
} from './scripts.js';
export { handleServices, handleServicesInspect } from './services.js';
export { handleStateGet, handleStateSet } from './state.js';
export { handleWatch } from './watch.js';
