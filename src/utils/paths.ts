import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'tidyname';

function appName(app: string) {
	const trimmed = app?.trim();
	return trimmed && trimmed.length > 0 ? trimmed : APP_NAME;
}

/**
 * Where session logs go. `TIDYNAME_LOGS` wins, then `XDG_STATE_HOME`, then the
 * platform default.
 */
export function logsDir(app = APP_NAME) {
	const override = process.env.TIDYNAME_LOGS;
	if (override && override.length > 0) return override;
	const name = appName(app);
	const xdgState = process.env.XDG_STATE_HOME;
	if (xdgState && xdgState.length > 0) return path.join(xdgState, name, 'logs');
	const home = os.homedir();
	if (process.platform === 'darwin') return path.join(home, 'Library', 'Logs', name);
	return path.join(home, '.local', 'state', name, 'logs');
}
