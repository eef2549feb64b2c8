import express, { Request, Response } from "express";
import { matchRoutes } from "./routes/match";
import { configRoutes } from "./routes/config";
import { getConfigStore } from "./config/engine-config";

/**
 * Build the Express application. Listening is left to the caller.
 */
export function createApp() {
    const app = express();

    // Middleware; screening payloads carry one vector per candidate
    app.use(express.json({ limit: "50mb" }));

    // Routes
    app.use("/match", matchRoutes);
    app.use("/config", configRoutes);

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({
            status: "ok",
            configVersion: getConfigStore().get().version,
            timestamp: new Date().toISOString()
        });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Candidate–Position Matching Engine API",
            version: "1.0.0",
            description: "Explainable candidate/position match scores from precomputed embeddings",
            endpoints: {
                "Matching": {
                    "POST /match/detail": "Detailed match result for one candidate and position",
                    "POST /match/screen": "Rank candidates by whole-profile similarity",
                    "POST /match/screen/batch": "Rank a large candidate set on the worker pool"
                },
                "Configuration": {
                    "GET /config": "Active engine configuration",
                    "POST /config/reload": "Reload configuration tables from disk"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            },
            infrastructure: {
                "Queue System": "BullMQ with Redis"
            }
        });
    });

    return app;
}
