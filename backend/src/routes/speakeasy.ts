import { Hono } from 'hono';
import type { AppEnv } from '../types';
import { PROTECTED_BODY } from '../constants';

const speakeasy = new Hono<AppEnv>();

speakeasy.get('/', (c) => c.text(PROTECTED_BODY, 200));

export default speakeasy;
