/**
 * Process exit codes. External supervisors match on these values.
 */
export const RC_OK = 0;
export const RC_NO_DEVICE = 1;
export const RC_NOT_RUNNING = 2;
export const RC_ALREADY_RUNNING = 3;
export const RC_USAGE = 64;
