import express from "express";
import routes from "./routes";
import { errorMessage } from "../utils/errors";
import { logError, logInfo } from "../utils/logger";

const app = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// CORS headers for development
app.use((req, res, next) => {
  res.header("Access-Control-Allow-Origin", "*");
  res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
  if (req.method === "OPTIONS") {
    res.sendStatus(200);
  } else {
    next();
  }
});

// Routes
app.use("/api", routes);

// Root endpoint
app.get("/", (req, res) => {
  res.json({
    message: "Personal Finance Health API",
    version: "1.0.0",
    endpoints: {
      analyse: "POST /api/analyse",
      metrics: "POST /api/metrics",
      benchmarks: "GET /api/benchmarks",
      health: "GET /api/health",
    },
  });
});

// Error handling middleware; malformed JSON bodies surface here
app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Malformed JSON body", message: err.message });
    return;
  }
  logError("Unhandled error:", err);
  res.status(500).json({
    error: "Internal server error",
    message: errorMessage(err),
  });
});

// Start server
if (require.main === module) {
  app.listen(PORT, () => {
    logInfo(`Server running on port ${PORT}`);
    logInfo(`API available at http://localhost:${PORT}/api`);
  });
}

export default app;
