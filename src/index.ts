import dotenv from "dotenv";
import { createApp } from "./app";
import { loadExtractionConfig } from "./config";

dotenv.config();

const config = loadExtractionConfig();
const app = createApp();

// Start the server
app.listen(config.port, () => {
  console.log(`Server is running on http://localhost:${config.port}`);
});

export default app;
