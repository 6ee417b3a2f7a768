// Prints an AUTH_PASSWORD_HASH value for the given password.
// Usage: npm run hash-password -- '<password>'

import { hashPassword } from "../utils/password";

const password = process.argv[2];

if (!password) {
  console.error("Usage: npm run hash-password -- '<password>'");
  process.exit(1);
}

console.log(`AUTH_PASSWORD_HASH=${hashPassword(password)}`);
