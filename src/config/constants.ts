export const SERVICE_NAME = 'plant-care-api';
export const APP_VERSION = '1.0.0';
export const API_VERSION = 'v1';
