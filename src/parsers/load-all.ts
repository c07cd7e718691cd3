// Importing a site module registers its profile
import './sites/ross-bus.js'
import './sites/daimler-coaches.js'
import './sites/micro-bird.js'
