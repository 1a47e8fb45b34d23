// Test setup file to configure environment variables for testing
process.env.NODE_ENV = 'test';
process.env.PUSH_API_KEY = 'test-api-key';
process.env.APNS_TEAM_ID = 'TEAMID1234';
process.env.APNS_KEY_ID = 'KEYID56789';
process.env.APNS_TOPIC = 'com.example.app';
delete process.env.APNS_ENDPOINT;
delete process.env.APNS_PRIVATE_KEY;
delete process.env.APNS_PRIVATE_KEY_PATH;
