/** Reported by `helpdesk --version` and `GET /` */
export const VERSION = '0.1.0';
