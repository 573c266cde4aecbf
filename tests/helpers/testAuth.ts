import jwt from 'jsonwebtoken';
import request from 'supertest';
import { Application } from 'express';

import { SubsidyRole } from '../../src/auth/auth.types';
import { config } from '../../src/config';

export const signToken = (
  userId: string,
  roles: Array<{ role: SubsidyRole; context: string }>,
  options: jwt.SignOptions = {}
): string => jwt.sign({ sub: userId, email: `${userId}@example.com`, roles }, config.jwt.secret, options);

export const authenticatedRequest = (app: Application, token: string) => {
  return {
    get: (url: string) => request(app).get(url).set('Authorization', `Bearer ${token}`),
    post: (url: string) => request(app).post(url).set('Authorization', `Bearer ${token}`),
  };
};
