import { describe, it, expect } from 'vitest';
import { Command, Send, interrupt, isCommand } from '../../../src/graph/command';

interface FlowState {
    step: string;
}

describe('Command', () => {
    it('should build each directive', () => {
        expect(Command.goto<FlowState>('next').directive).toEqual({ type: 'goto', target: 'next' });
        expect(Command.gotoWithUpdate<FlowState>('next', { step: 's' }).directive)
            .toEqual({ type: 'goto', target: 'next', update: { step: 's' } });
        expect(Command.end<FlowState>().directive).toEqual({ type: 'end' });
        expect(Command.update<FlowState>({ step: 'u' }).directive).toEqual({ type: 'update', update: { step: 'u' } });
        expect(Command.interrupt<FlowState>('why?').directive).toEqual({ type: 'interrupt', payload: 'why?' });
    });

    it('should normalize send targets to Send objects', () => {
        const command = Command.send<FlowState>(['a', new Send<FlowState>('b', { step: 'custom' })]);

        expect(command.directive).toEqual({
            type: 'send',
            targets: [new Send('a'), new Send('b', { step: 'custom' })],
        });
    });

    it('should expose the carried update', () => {
        expect(Command.end<FlowState>({ step: 'done' }).update).toEqual({ step: 'done' });
        expect(Command.goto<FlowState>('x').update).toBeUndefined();
        expect(Command.send<FlowState>(['x']).update).toBeUndefined();
    });

    it('should build an interrupt command from the helper', () => {
        expect(interrupt<FlowState>({ ask: 'ok?' }, { step: 'paused' }).directive)
            .toEqual({ type: 'interrupt', payload: { ask: 'ok?' }, update: { step: 'paused' } });
    });

    it('should tell commands from plain updates', () => {
        expect(isCommand<FlowState>(Command.end<FlowState>())).toBe(true);
        expect(isCommand<FlowState>({ step: 'plain' })).toBe(false);
        expect(isCommand<FlowState>(undefined)).toBe(false);
    });
});
