process.env.NODE_ENV = "test";
process.env.ARBITER_IDENTITY = "arbiter";
process.env.ESCROW_CUSTODY_IDENTITY = "escrow-custody";
process.env.JWT_SECRET = "test-secret";
process.env.BACKOFFICE_BASIC_USER = "admin";
process.env.BACKOFFICE_BASIC_PASS = "test-pass";
