/** Process exit codes shared by the command line scripts */
export const EXIT_OK = 0;
export const EXIT_COMMAND_FAILED = 1;
export const EXIT_PARTIAL_FAILURE = 2;
