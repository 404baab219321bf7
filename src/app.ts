import express, { Request, Response, NextFunction } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import extractionRouter from "./routes/extraction.route";

export const createApp = () => {
  const app = express();
  app.use(bodyParser.json());
  app.use(cors());

  app.use("/extraction", extractionRouter);

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const statusCode = res.statusCode >= 400 ? res.statusCode : err instanceof SyntaxError ? 400 : 500;
    console.error(err.stack);
    res.status(statusCode).json({ success: false, error: err.message });
  });

  return app;
};
