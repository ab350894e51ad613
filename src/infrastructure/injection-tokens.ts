// Injection tokens (string symbols for DI)
export const STORAGE_CLIENT_FACTORY = 'StorageClientFactory';
export const STORAGE_CLIENT_REGISTRY_PORT = 'StorageClientRegistryPort';
export const VALIDATOR_PORT = 'ValidatorPort';
export const SCRATCH_SPACE_PORT = 'ScratchSpacePort';
export const FETCH_FILE_PORT = 'FetchFilePort';
export const PROCESS_ROW_PORT = 'ProcessRowPort';
