import express from "express";
import routes from "./routes";
import { loadConfig } from "../utils/config";
import { API_INFO } from "./info";

const app = express();

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
  res.json(API_INFO);
});

// Error handling middleware
// Body parser failures carry their own 4xx status
app.use(
  (
    err: Error & { status?: number },
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) => {
    if (res.headersSent) {
      return next(err);
    }
    const status = err.status ?? 500;
    if (status >= 500) {
      console.error("Unhandled error:", err);
      res.status(status).json({ error: "Internal server error", message: err.message });
    } else {
      res.status(status).json({ error: "Bad request", message: err.message });
    }
  }
);

// Start server
if (require.main === module) {
  const { port } = loadConfig();
  app.listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`API available at http://localhost:${port}/api`);
  });
}

export default app;
