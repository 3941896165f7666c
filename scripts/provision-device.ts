import { parseArgs } from "util";
import { loadConfig } from "../server/config";
import { createDatabase } from "../server/db";
import { DatabaseStorage } from "../server/storage";
import { provisionDevice, setDeviceActive } from "../server/device-provisioning";
import { toAppError } from "../server/error-handling";

const USAGE = `Usage:
  npm run provision-device -- create --code <deviceCode> --password <password> [--location <text>] [--description <text>]
  npm run provision-device -- activate --code <deviceCode>
  npm run provision-device -- deactivate --code <deviceCode>`;

async function main() {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      code: { type: "string" },
      password: { type: "string" },
      location: { type: "string" },
      description: { type: "string" },
    },
  });

  const [command] = positionals;
  if (!command || !values.code) {
    console.log(USAGE);
    process.exit(1);
  }

  const config = loadConfig();
  if (!config.databaseUrl) {
    console.error("DATABASE_URL must be set to provision devices");
    process.exit(1);
  }

  const { pool, db } = createDatabase(config.databaseUrl);
  const storage = new DatabaseStorage(db);

  try {
    switch (command) {
      case "create": {
        if (!values.password) {
          console.log(USAGE);
          process.exit(1);
        }
        const { device, created } = await provisionDevice(storage, {
          deviceCode: values.code,
          password: values.password,
          location: values.location,
          description: values.description,
        });
        console.log(created ? `Created device '${device.deviceCode}'` : `Password updated for device '${device.deviceCode}'`);
        console.log(`  Device ID: ${device.id}`);
        break;
      }
      case "activate":
      case "deactivate": {
        const device = await setDeviceActive(storage, values.code, command === "activate");
        console.log(`Device '${device.deviceCode}' is now ${device.isActive ? "active" : "inactive"}`);
        break;
      }
      default:
        console.log(USAGE);
        process.exitCode = 1;
    }
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  const appError = toAppError(err);
  console.error(`Error: ${appError.code}: ${appError.describe()}`);
  process.exit(1);
});
