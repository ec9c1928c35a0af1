import express, { Request, Response } from "express";
import cors from "cors";
import queryRouter from "./api/query";
import calculateRouter from "./api/calculate";
import cardsRouter from "./api/cards";
import { ENV } from "./config/env";

const app = express();

// --------------------------------------
// CORS (Frontend → Backend)
// --------------------------------------
app.use(
  cors({
    origin: ENV.CORS_ORIGIN,
  })
);

// --------------------------------------
// Middleware
// --------------------------------------
app.use(express.json());

// --------------------------------------
// Health check
// --------------------------------------
app.get("/health", (_req: Request, res: Response) => {
  res.status(200).json({ status: "ok" });
});

// --------------------------------------
// Query API (intent → context → answer)
// --------------------------------------
app.use("/api", queryRouter);

// --------------------------------------
// Reward calculator API
// --------------------------------------
app.use("/api", calculateRouter);

// --------------------------------------
// Cards API (list loaded cards)
// --------------------------------------
app.use("/api/cards", cardsRouter);

export default app;
