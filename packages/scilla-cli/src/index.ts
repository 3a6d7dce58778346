#!/usr/bin/env node

import 'reflect-metadata'

import { launchCliProgram } from './mainCommand'

launchCliProgram({ version: '0.1.0' })
