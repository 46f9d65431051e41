import { writeFlagFile, type HubConfig } from '../config.js';
import { closeDb, connectDb, deleteInstance, initDb } from '../db.js';
import { clearIdentity, loadIdentity } from '../identity.js';

// These run whether or not the layer is enabled.

export function handleInit(config: HubConfig): { success: true; db_path: string } {
  initDb(config.dbPath);
  return { success: true, db_path: config.dbPath };
}

export function handleEnable(config: HubConfig): { success: true; enabled: true; flag_file: string } {
  writeFlagFile(config.flagFile, true);
  return { success: true, enabled: true, flag_file: config.flagFile };
}

export function handleDisable(config: HubConfig): {
  success: true;
  enabled: false;
  flag_file: string;
  deregistered: string | null;
  warning?: string;
} {
  writeFlagFile(config.flagFile, false);
  const identity = loadIdentity(config.identityFile);
  if (!identity) {
    return { success: true, enabled: false, flag_file: config.flagFile, deregistered: null };
  }

  let warning: string | undefined;
  try {
    connectDb(config.dbPath);
    deleteInstance(identity.instance_id);
  } catch (error) {
    warning = `could not remove instance ${identity.instance_id}: ${error instanceof Error ? error.message : String(error)}`;
  } finally {
    closeDb();
  }
  clearIdentity(config.identityFile);
  return {
    success: true,
    enabled: false,
    flag_file: config.flagFile,
    deregistered: identity.instance_id,
    ...(warning ? { warning } : {}),
  };
}
