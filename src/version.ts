export const APP_NAME = "marksplit";
export const VERSION = "0.1.0";
