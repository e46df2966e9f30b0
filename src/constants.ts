export const CLI_NAME = "rpbs";

export const HOST_FILE_NAME = "host.json";

export const DEFAULT_PRIVATE_KEY = "~/.ssh/id_rsa";
export const DEFAULT_REMOTE_DIR = "/tmp";
export const DEFAULT_SSH_PORT = 22;

export const QUEUE_SUBMIT_COMMAND = "qsub";
export const QUEUE_STATUS_COMMAND = "qstat";
