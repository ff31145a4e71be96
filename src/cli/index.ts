#!/usr/bin/env node

import dotenv from 'dotenv'
import { createProgram } from './program'

dotenv.config()

await createProgram().parseAsync()
