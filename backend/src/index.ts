// Load environment variables before ENV is read
import "dotenv/config";
import app from "./app";
import { ENV } from "./config/env";
import { getCardData } from "./services/card-data.service";

// Load card data once; it is shared read-only across requests
getCardData();

// Server start
const PORT = ENV.PORT;

app.listen(PORT, () => {
  console.log(`Backend server running on port ${PORT}`);
});
