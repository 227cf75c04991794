import EventFrame, { EventFrameInit } from './EventFrame'
import { EventDetectionLibrary, EventDetectionMethod, defaultEventDetectionLibrary } from './EventDetectionLibrary'
import { idt, DEFAULT_IDT_OPTIONS } from './idt'
import { dispersion, DispersionBounds } from './utils/dispersion'
import {
    filterCandidatesRemoveNans,
    eventsSplitNans,
    composePolicies,
    createMissingValuePolicy
} from './utils/filters'
import { ShapeError, LengthMismatchError, ValueError } from './errors'
import { PositionsInput, Candidate, CandidatePolicy, IdtOptions, EventRecord } from './types'

export {
    idt,
    DEFAULT_IDT_OPTIONS,
    dispersion,
    DispersionBounds,
    EventFrame,
    EventFrameInit,
    EventDetectionLibrary,
    EventDetectionMethod,
    defaultEventDetectionLibrary,
    filterCandidatesRemoveNans,
    eventsSplitNans,
    composePolicies,
    createMissingValuePolicy,
    ShapeError,
    LengthMismatchError,
    ValueError,
    PositionsInput,
    Candidate,
    CandidatePolicy,
    IdtOptions,
    EventRecord
}
