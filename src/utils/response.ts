import { Response } from "express";

type SuccessPayload<T extends object> = { success: true } & T;

type ErrorPayload = {
  success: false;
  error: string;
};

export const sendSuccess = <T extends object>(
  res: Response,
  data: T,
  status = 200
) => {
  const payload: SuccessPayload<T> = { success: true, ...data };
  return res.status(status).json(payload);
};

export const sendError = (res: Response, error: string, status = 400) => {
  const payload: ErrorPayload = { success: false, error };
  return res.status(status).json(payload);
};
